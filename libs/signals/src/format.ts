const usdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const compactFormatter = new Intl.NumberFormat('en-US', {
  notation: 'compact',
  maximumFractionDigits: 2,
});

const priceFormatter = (fractionDigits: number) =>
  new Intl.NumberFormat('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });

const smallPrice = priceFormatter(4);
const largePrice = priceFormatter(2);

export const formatUsd = (value: number): string => usdFormatter.format(value);

/** "$1.25B" style, for table columns. */
export const formatCompactUsd = (value: number): string => `$${compactFormatter.format(value)}`;

export const formatPrice = (value: number): string =>
  Math.abs(value) < 1 ? smallPrice.format(value) : largePrice.format(value);

export const formatSignedPct = (value: number): string =>
  `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

export const formatRatio = (value: number): string => `${value.toFixed(2)}x`;
