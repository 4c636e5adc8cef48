import type { ScreenerConfig } from '@libs/core';

export interface ProviderEndpoints {
  rest: string;
}

const BYBIT_ENDPOINTS: Record<'mainnet' | 'testnet', ProviderEndpoints> = {
  mainnet: { rest: 'https://api.bybit.com' },
  testnet: { rest: 'https://api-testnet.bybit.com' },
};

export const getProviderEndpoints = (
  config: Pick<ScreenerConfig, 'useTestEndpoint' | 'restUrl'>,
): ProviderEndpoints => {
  const defaults = BYBIT_ENDPOINTS[config.useTestEndpoint ? 'testnet' : 'mainnet'];
  return {
    rest: config.restUrl ?? defaults.rest,
  };
};
