import { z } from 'zod';

export const PriceSchema = z.number().finite().positive();

export const BuyNGetMFreeRuleSchema = z.object({
  type: z.literal('buy_n_get_m_free'),
  buyCount: z.number().int().positive(),
  freeCount: z.number().int().positive(),
});

// only one rule kind today; widen to a discriminated union when another lands
export const DiscountRuleSchema = BuyNGetMFreeRuleSchema;
