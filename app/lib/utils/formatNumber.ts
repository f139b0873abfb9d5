/**
 * Round half away from zero to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export function formatUsd(value: number): string {
  if (!isFinite(value)) return '';
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(value);
}

/**
 * Short axis label: $950, $12.5k, $1.2M
 */
export function formatCompactUsd(value: number): string {
  if (value === 0 || !isFinite(value)) return '$0';

  const absValue = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (absValue >= 1_000_000) {
    return `${sign}$${trimZeros((absValue / 1_000_000).toFixed(1))}M`;
  } else if (absValue >= 1_000) {
    return `${sign}$${trimZeros((absValue / 1_000).toFixed(1))}k`;
  }
  return `${sign}$${absValue.toFixed(0)}`;
}

export function formatYears(value: number, decimals: number = 2): string {
  return `${trimZeros(value.toFixed(decimals))} ${value === 1 ? 'year' : 'years'}`;
}

function trimZeros(formatted: string): string {
  return formatted.includes('.') ? formatted.replace(/\.?0+$/, '') : formatted;
}
