import Big from 'big.js';

export type OrderSide = 'BUY' | 'SELL';

/**
 * 슬리피지를 적용한 실제 체결 가격 계산
 *
 * 매수는 close × (1 + rate), 매도는 close × (1 - rate). 항상 불리한 방향.
 *
 * @param price - 기준 가격 (봉 종가)
 * @param slippageRate - 슬리피지 비율 (0.0005 = 0.05%)
 */
export function applySlippage(price: Big, slippageRate: number, side: OrderSide): Big {
  const rate = new Big(slippageRate);

  if (side === 'BUY') {
    return price.times(new Big(1).plus(rate));
  }
  return price.times(new Big(1).minus(rate));
}

/**
 * 슬리피지로 인한 비용 (기준 가격 대비 불리하게 체결된 금액)
 */
export function calculateSlippageCost(price: Big, executionPrice: Big, qty: Big): Big {
  return executionPrice.minus(price).abs().times(qty);
}

/**
 * 수수료 = 체결 금액 × 수수료율
 */
export function calculateCommission(notional: Big, commissionRate: number): Big {
  return notional.times(commissionRate);
}
