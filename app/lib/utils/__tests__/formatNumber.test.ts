import { formatCompactUsd, formatUsd, formatYears, roundTo } from '../formatNumber';

describe('formatNumber', () => {
  it('rounds to a fixed number of decimals', () => {
    expect(roundTo(1126.4349)).toBe(1126.43);
    expect(roundTo(-1126.4351)).toBe(-1126.44);
    expect(roundTo(6.6666, 1)).toBe(6.7);
    expect(roundTo(0)).toBe(0);
  });

  it('formats USD amounts with cents', () => {
    expect(formatUsd(1234.5)).toBe('$1,234.50');
    expect(formatUsd(-10)).toBe('-$10.00');
    expect(formatUsd(NaN)).toBe('');
  });

  it('formats compact axis labels', () => {
    expect(formatCompactUsd(0)).toBe('$0');
    expect(formatCompactUsd(950)).toBe('$950');
    expect(formatCompactUsd(20000)).toBe('$20k');
    expect(formatCompactUsd(12500)).toBe('$12.5k');
    expect(formatCompactUsd(1_200_000)).toBe('$1.2M');
    expect(formatCompactUsd(-4600)).toBe('-$4.6k');
  });

  it('formats year counts', () => {
    expect(formatYears(20 / 3)).toBe('6.67 years');
    expect(formatYears(7)).toBe('7 years');
    expect(formatYears(1)).toBe('1 year');
  });
});
