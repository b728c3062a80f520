import type { Catalog, DiscountRule, DiscountRules, RawCatalog, RawDiscountRules } from './models.js';
import { DiscountRuleSchema, PriceSchema } from './schemas.js';

// canonical lookup form: "  iPHONE   11 " -> "Iphone 11"
export function normalizeProductName(name: string): string {
  return name
    .trim()
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

// first raw key wins when two normalize to the same name
export function loadCatalog(raw: RawCatalog): Catalog {
  const catalog = new Map<string, number>();

  for (const [rawName, price] of Object.entries(raw)) {
    const name = normalizeProductName(rawName);
    if (name === '' || catalog.has(name)) continue;
    if (!PriceSchema.safeParse(price).success) continue;
    catalog.set(name, price);
  }

  return catalog;
}

export function loadDiscountRules(raw: RawDiscountRules): DiscountRules {
  const rules = new Map<string, DiscountRule>();

  for (const [rawName, candidate] of Object.entries(raw)) {
    const parsed = DiscountRuleSchema.safeParse(candidate);
    if (!parsed.success) continue;

    const name = normalizeProductName(rawName);
    if (name === '' || rules.has(name)) continue;
    rules.set(name, parsed.data);
  }

  return rules;
}
