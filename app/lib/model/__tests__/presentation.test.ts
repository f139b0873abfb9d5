import { describeBreakEven, toChartSeries, toTableRows } from '../presentation';
import { projectCumulativeCosts } from '../cost_accumulator';

describe('Presentation', () => {
  const projection = projectCumulativeCosts({
    purchasePriceA: 1234.5678,
    purchasePriceB: 99.994,
    annualCostA: 0.004,
    annualCostB: 100,
    horizonYears: 1,
  });

  it('rounds table rows to cents without touching the projection', () => {
    expect(toTableRows(projection)[0]).toEqual({ year: 0, costA: 1234.57, costB: 99.99, difference: 1134.57 });
    expect(projection[0].costA).toBe(1234.5678);
  });

  it('keys chart points by vehicle name', () => {
    const { points, keyA, keyB } = toChartSeries(projection, 'Toyota Corolla', 'Nissan Leaf');
    expect(keyA).toBe('Toyota Corolla');
    expect(keyB).toBe('Nissan Leaf');
    expect(points[1]).toEqual({ year: 1, 'Toyota Corolla': 1234.57, 'Nissan Leaf': 199.99 });
  });

  it('keeps both series when the names collide', () => {
    const { points, keyA, keyB } = toChartSeries(projection, 'Same Car', 'Same Car');
    expect(keyB).toBe('Same Car (B)');
    expect(Object.keys(points[0])).toEqual(['year', keyA, keyB]);
  });

  describe('describeBreakEven', () => {
    it('describes each outcome', () => {
      expect(describeBreakEven({ status: 'NOT_REACHED', mode: 'INTEGER' }, 'Nissan Leaf')).toBe(
        'Nissan Leaf does not reach the break-even point within the selected horizon.'
      );
      expect(describeBreakEven({ status: 'AT_PURCHASE', mode: 'INTERPOLATED', year: 0 }, 'Nissan Leaf')).toBe(
        'Nissan Leaf is already the cheaper option at purchase (year 0).'
      );
      expect(
        describeBreakEven({ status: 'REACHED', mode: 'INTEGER', year: 7, bracket: { from: 6, to: 7 } }, 'Nissan Leaf')
      ).toBe('Nissan Leaf reaches the break-even point in year 7.');
      expect(
        describeBreakEven(
          { status: 'REACHED', mode: 'INTERPOLATED', year: 20 / 3, bracket: { from: 6, to: 7 } },
          'Nissan Leaf'
        )
      ).toBe('Nissan Leaf reaches the break-even point after 6.67 years (between years 6 and 7).');
    });
  });
});
