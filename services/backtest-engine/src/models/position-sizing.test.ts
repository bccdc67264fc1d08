import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { computeOrderQty } from './position-sizing.js';

describe('주문 수량 계산', () => {
  it('all-in: 수수료 포함 감당 가능한 최대 정수 수량', () => {
    // 10000 / (100 × 1.001) = 99.9 → 99
    const qty = computeOrderQty({ type: 'all-in' }, new Big(10000), new Big(100), 0.001);

    expect(qty.toString()).toBe('99');
  });

  it('all-in: 수수료 0이면 정확히 나눠떨어지는 수량', () => {
    const qty = computeOrderQty({ type: 'all-in' }, new Big(10000), new Big(100), 0);

    expect(qty.toString()).toBe('100');
  });

  it('all-in: 가격이 현금보다 크면 0', () => {
    const qty = computeOrderQty({ type: 'all-in' }, new Big(50), new Big(100), 0.001);

    expect(qty.eq(0)).toBe(true);
  });

  it('fractional: 소수 수량 (8자리 내림)', () => {
    // 1000 / 300 = 3.333333333...
    const qty = computeOrderQty({ type: 'fractional' }, new Big(1000), new Big(300), 0);

    expect(qty.toString()).toBe('3.33333333');
    expect(qty.times(300).lte(1000)).toBe(true);
  });

  it('fixed-fraction: 현금의 일부만 사용', () => {
    // 10000 × 0.5 = 5000 / 100 = 50
    const qty = computeOrderQty({ type: 'fixed-fraction', fraction: 0.5 }, new Big(10000), new Big(100), 0);

    expect(qty.toString()).toBe('50');
  });

  it('현금이 없으면 0', () => {
    expect(computeOrderQty({ type: 'all-in' }, new Big(0), new Big(100), 0).eq(0)).toBe(true);
  });
});
