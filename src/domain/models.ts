import type { z } from 'zod';
import type { DiscountRuleSchema } from './schemas.js';

// product name -> unit price, keys already normalized
export type Catalog = ReadonlyMap<string, number>;

export type DiscountRule = z.infer<typeof DiscountRuleSchema>;

export type DiscountRules = ReadonlyMap<string, DiscountRule>;

// product name -> quantity; zero quantities are never stored
export type Cart = Map<string, number>;

// compiled-in store data before normalization and validation
export type RawCatalog = Readonly<Record<string, number>>;
export type RawDiscountRules = Readonly<Record<string, unknown>>;

export interface InvoiceLine {
  productName: string;
  quantity: number;
  unitPrice: number;
  freeCount: number;
  amountDue: number;
}

export interface DiscountDetail {
  productName: string;
  quantity: number;
  freeUnits: number;
  lineCost: number;
  savings: number;
}

export interface Totals {
  subtotal: number; // before discounts
  grandTotal: number;
  lines: InvoiceLine[];
  discounts: DiscountDetail[];
}

export interface CartView {
  lines: string[];
  total: number;
}
