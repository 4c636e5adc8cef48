import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'perp-screener/1.0' },
  });
