import type { RawCatalog, RawDiscountRules } from '../../domain/models.js';

// compiled-in store data, validated and normalized at startup
export const STORE_CATALOG: RawCatalog = {
  'Iphone 11': 2100.99,
  'Samsung Galaxy S20': 1799.5,
  'Airpods Pro': 249.99,
  'Wireless Charger': 39.99,
  'Phone Case': 14.99,
  'Screen Protector': 9.99,
};

export const STORE_DISCOUNT_RULES: RawDiscountRules = {
  'Iphone 11': { type: 'buy_n_get_m_free', buyCount: 3, freeCount: 1 },
  'Phone Case': { type: 'buy_n_get_m_free', buyCount: 2, freeCount: 1 },
  'Screen Protector': { type: 'buy_n_get_m_free', buyCount: 4, freeCount: 2 },
};
