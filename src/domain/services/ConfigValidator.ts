import type { RawCatalog, RawDiscountRules } from '../models.js';
import { normalizeProductName } from '../catalog.js';
import { DiscountRuleSchema, PriceSchema } from '../schemas.js';

// startup checks over the compiled-in store data; findings are warnings only
export function validateConfiguration(
  catalog: RawCatalog,
  discountRules: RawDiscountRules
): string[] {
  const warnings: string[] = [];
  const seen = new Map<string, string>();
  const badPrice = new Set<string>();

  for (const [rawName, price] of Object.entries(catalog)) {
    if (rawName !== rawName.trim()) {
      warnings.push(`Catalog key '${rawName}' has leading or trailing whitespace.`);
    }

    if (!PriceSchema.safeParse(price).success) {
      warnings.push(`Catalog entry '${rawName}' has an invalid price (${price}); it will be ignored.`);
      badPrice.add(normalizeProductName(rawName));
      continue;
    }

    const name = normalizeProductName(rawName);
    const first = seen.get(name);
    if (first !== undefined) {
      warnings.push(`Catalog keys '${first}' and '${rawName}' both resolve to '${name}'; keeping the first.`);
    } else {
      seen.set(name, rawName);
    }
  }

  const ruleKeys = new Map<string, string>();
  for (const [rawName, rule] of Object.entries(discountRules)) {
    const parsed = DiscountRuleSchema.safeParse(rule);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'rule'}: ${issue.message}` : 'invalid rule';
      warnings.push(`Discount rule for '${rawName}' is malformed (${detail}); it will be ignored.`);
      continue;
    }

    const name = normalizeProductName(rawName);
    const first = ruleKeys.get(name);
    if (first !== undefined) {
      warnings.push(`Discount rules '${first}' and '${rawName}' both resolve to '${name}'; keeping the first.`);
      continue;
    }
    ruleKeys.set(name, rawName);

    if (seen.has(name)) continue;
    if (badPrice.has(name)) {
      warnings.push(`Discount rule for '${rawName}' will never apply: its catalog entry was ignored for an invalid price.`);
    } else {
      warnings.push(`Discount rule references unknown product '${rawName}'.`);
    }
  }

  return warnings;
}
