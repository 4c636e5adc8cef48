export * from './models';
export * from './errors';
export * from './interfaces';
export * from './normalizers';
export * from './request-gate';
export * from './symbol-health';
export * from './snapshot-fetcher.service';
export * from './providers/bybit.provider';
export * from './providers/providers.config';
export * from './utils/retry.util';
export * from './utils/sleep.util';
export * from './utils/concurrency.util';
export * from './utils/http.util';
export * from './market-data.module';
