const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format a money amount with thousands separators and two decimals, e.g. 1,950,000.00
 */
export function formatAmount(value: number): string {
  if (!Number.isFinite(value)) return '0.00';
  return amountFormat.format(value);
}

export function formatShare(share: number): string {
  return `${share.toFixed(1)}%`;
}
