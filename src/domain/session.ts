import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type { Cart, Catalog, DiscountRules } from './models.js';
import { CartService } from './services/CartService.js';
import { TotalsCalculator } from './services/TotalsCalculator.js';
import type { IDiscountStrategy } from './strategies/IDiscountStrategy.js';

// everything one shopping session needs, built once by the entry point
export interface ShoppingSession {
  sessionId: string;
  catalog: Catalog;
  discountRules: DiscountRules;
  cart: Cart;
  cartService: CartService;
  totals: TotalsCalculator;
  currency: string;
  logger: Logger;
}

export function createSession(options: {
  catalog: Catalog;
  discountRules: DiscountRules;
  logger: Logger;
  currency?: string;
  maxQuantity?: number;
  strategy?: IDiscountStrategy;
}): ShoppingSession {
  const sessionId = uuidv4();
  const logger = options.logger.child({ sessionId });

  return {
    sessionId,
    catalog: options.catalog,
    discountRules: options.discountRules,
    cart: new Map<string, number>(),
    cartService: new CartService(options.catalog, logger, { maxQuantity: options.maxQuantity }),
    totals: new TotalsCalculator(options.catalog, options.discountRules, options.strategy),
    currency: options.currency ?? '$',
    logger,
  };
}
