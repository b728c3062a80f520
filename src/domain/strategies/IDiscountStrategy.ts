import type { DiscountRule } from '../models.js';

export interface IDiscountStrategy {
  readonly type: DiscountRule['type'];
  freeUnits(quantity: number, rule: DiscountRule): number;
}

// free units under buy-N-get-M-free, never more than `quantity`
export function computeFreeUnits(quantity: number, buyCount: number, freeCount: number): number {
  if (buyCount <= 0 || freeCount <= 0) return 0;
  if (quantity < buyCount) return 0;

  const sets = Math.floor(quantity / buyCount);
  const free = sets * freeCount;
  return Math.min(free, quantity);
}

export class BuyNGetMFreeStrategy implements IDiscountStrategy {
  readonly type = 'buy_n_get_m_free' as const;

  freeUnits(quantity: number, rule: DiscountRule): number {
    return computeFreeUnits(quantity, rule.buyCount, rule.freeCount);
  }
}
