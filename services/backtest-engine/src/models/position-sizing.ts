import Big from 'big.js';
import type { SizingPolicy } from '../types.js';

/** fractional 정책의 수량 소수 자릿수 */
const FRACTIONAL_QTY_DP = 8;

/**
 * 주문 수량 계산
 *
 * 매수 비용 qty × price × (1 + commissionRate)가 예산을 넘지 않는 최대 수량.
 * - all-in: 현금 전액, 정수 수량
 * - fractional: 현금 전액, 소수 8자리까지 (내림)
 * - fixed-fraction: 현금 × fraction, 정수 수량
 *
 * @param price - 슬리피지 반영 체결가
 * @returns 주문 수량 (0이면 주문 불가)
 */
export function computeOrderQty(
  policy: SizingPolicy,
  cash: Big,
  price: Big,
  commissionRate: number
): Big {
  if (cash.lte(0) || price.lte(0)) {
    return new Big(0);
  }

  const budget = policy.type === 'fixed-fraction' ? cash.times(policy.fraction) : cash;
  const unitCost = price.times(new Big(1).plus(commissionRate));

  if (policy.type === 'fractional') {
    return budget.div(unitCost).round(FRACTIONAL_QTY_DP, 0); // RoundDown
  }

  let qty = budget.div(unitCost).round(0, 0); // RoundDown

  // 나눗셈 반올림 오차로 예산을 넘으면 한 주 줄인다
  while (qty.gt(0) && qty.times(unitCost).gt(budget)) {
    qty = qty.minus(1);
  }

  return qty;
}
