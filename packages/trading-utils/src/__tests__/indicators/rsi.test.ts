import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { calculateRSI, calculateRSISeries } from '../../indicators/rsi.js';

function series(...values: number[]): Big[] {
  return values.map((v) => new Big(v));
}

describe('calculateRSI', () => {
  it('상승만 있으면 100', () => {
    expect(calculateRSI(series(1, 2, 3, 4), 3).toNumber()).toBe(100);
  });

  it('변화가 없으면 50', () => {
    expect(calculateRSI(series(5, 5, 5, 5), 3).toNumber()).toBe(50);
  });

  it('첫 구간은 단순 평균으로 계산', () => {
    // 변화: +1, -1, +1 → 평균 상승 2/3, 평균 하락 1/3 → RS = 2
    // RSI = 100 - 100 / 3 = 66.67
    expect(calculateRSI(series(10, 11, 10, 11), 3).toNumber()).toBeCloseTo(66.67, 2);
  });

  it('이후 구간은 Wilder 방식으로 평활', () => {
    // 평균 상승 (2/3 × 2 + 1) / 3 = 7/9, 평균 하락 (1/3 × 2) / 3 = 2/9 → RS = 3.5
    // RSI = 100 - 100 / 4.5 = 77.78
    expect(calculateRSI(series(10, 11, 10, 11, 12), 3).toNumber()).toBeCloseTo(77.78, 2);
  });

  it('하락만 있으면 0', () => {
    expect(calculateRSI(series(4, 3, 2, 1), 3).toNumber()).toBe(0);
  });

  it('값이 부족하면 에러를 던져야 함', () => {
    expect(() => calculateRSI(series(1, 2, 3), 3)).toThrow('RSI 계산에 최소 4개');
  });
});

describe('calculateRSISeries', () => {
  const values = series(10, 11, 10, 11, 12, 11, 9, 10, 13);

  it('길이 = 값 개수 - period', () => {
    expect(calculateRSISeries(values, 3)).toHaveLength(6);
  });

  it('k번째 값은 해당 시점까지의 calculateRSI 와 같다', () => {
    const rsiSeries = calculateRSISeries(values, 3);

    rsiSeries.forEach((rsi, k) => {
      expect(rsi.eq(calculateRSI(values.slice(0, k + 4), 3))).toBe(true);
    });
    expect(rsiSeries[1]!.toNumber()).toBeCloseTo(77.78, 2);
  });
});
