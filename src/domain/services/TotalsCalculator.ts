import type {
  Cart,
  Catalog,
  DiscountDetail,
  DiscountRules,
  InvoiceLine,
  Totals,
} from '../models.js';
import { BuyNGetMFreeStrategy, type IDiscountStrategy } from '../strategies/IDiscountStrategy.js';

// aggregates cart + catalog + discount strategy; totals are unrounded
export class TotalsCalculator {
  constructor(
    private readonly catalog: Catalog,
    private readonly rules: DiscountRules,
    private readonly strategy: IDiscountStrategy = new BuyNGetMFreeStrategy()
  ) {}

  computeTotal(cart: Cart): Totals {
    const lines: InvoiceLine[] = [];
    const discounts: DiscountDetail[] = [];
    let subtotal = 0;
    let grandTotal = 0;

    for (const [productName, quantity] of cart) {
      const unitPrice = this.catalog.get(productName);
      if (unitPrice === undefined) continue;

      const rule = this.rules.get(productName);
      const freeCount =
        rule !== undefined && rule.type === this.strategy.type
          ? this.strategy.freeUnits(quantity, rule)
          : 0;

      const lineCost = (quantity - freeCount) * unitPrice;
      subtotal += quantity * unitPrice;
      grandTotal += lineCost;

      lines.push({ productName, quantity, unitPrice, freeCount, amountDue: lineCost });

      if (freeCount > 0) {
        discounts.push({
          productName,
          quantity,
          freeUnits: freeCount,
          lineCost,
          savings: freeCount * unitPrice,
        });
      }
    }

    return { subtotal, grandTotal, lines, discounts };
  }
}
