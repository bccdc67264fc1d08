import Big from 'big.js';
import { BacktestError } from '../errors.js';
import type { PortfolioSnapshot, PositionState } from '../types.js';

/**
 * 단일 종목 롱 전용 포트폴리오
 *
 * equity = cash + qty × 현재 종가
 */
export class Portfolio {
  private cash: Big;
  private qty = new Big(0);
  private avgEntryPrice = new Big(0);
  private totalCommission = new Big(0);

  constructor(initialCapital: Big) {
    this.cash = initialCapital;
  }

  get state(): PositionState {
    return this.qty.gt(0) ? 'LONG' : 'FLAT';
  }

  get availableCash(): Big {
    return this.cash;
  }

  /**
   * 매수 체결 반영
   *
   * @throws BacktestError - 현금이 음수가 되는 경우
   */
  applyBuy(qty: Big, price: Big, commission: Big): void {
    if (qty.lte(0)) {
      throw new BacktestError(`매수 수량은 0보다 커야 합니다: ${qty.toString()}`);
    }

    const cost = qty.times(price).plus(commission);
    if (cost.gt(this.cash)) {
      throw new BacktestError(`현금 부족: 필요 ${cost.toString()}, 보유 ${this.cash.toString()}`);
    }

    const newQty = this.qty.plus(qty);
    this.avgEntryPrice = this.avgEntryPrice.times(this.qty).plus(price.times(qty)).div(newQty);
    this.qty = newQty;
    this.cash = this.cash.minus(cost);
    this.totalCommission = this.totalCommission.plus(commission);
  }

  /**
   * 매도 체결 반영
   *
   * @throws BacktestError - 보유 수량보다 많이 팔거나 현금이 음수가 되는 경우
   */
  applySell(qty: Big, price: Big, commission: Big): void {
    if (qty.lte(0) || qty.gt(this.qty)) {
      throw new BacktestError(`매도 수량 오류: 요청 ${qty.toString()}, 보유 ${this.qty.toString()}`);
    }

    const cash = this.cash.plus(qty.times(price)).minus(commission);
    if (cash.lt(0)) {
      throw new BacktestError(`매도 후 현금이 음수입니다: ${cash.toString()}`);
    }

    this.cash = cash;
    this.qty = this.qty.minus(qty);
    this.totalCommission = this.totalCommission.plus(commission);
    if (this.qty.eq(0)) {
      this.avgEntryPrice = new Big(0);
    }
  }

  markToMarket(close: Big): Big {
    return this.cash.plus(this.qty.times(close));
  }

  snapshot(): PortfolioSnapshot {
    return {
      cash: this.cash,
      qty: this.qty,
      avgEntryPrice: this.avgEntryPrice,
      totalCommission: this.totalCommission,
    };
  }
}
