import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { CartService } from '../src/domain/services/CartService.js';
import { loadCatalog } from '../src/domain/catalog.js';
import {
  InvalidQuantityError,
  NotInCartError,
  UnknownProductError,
} from '../src/domain/errors/index.js';
import { renderCart } from '../src/presentation/renderers.js';
import type { Cart } from '../src/domain/models.js';

const catalog = loadCatalog({
  'Iphone 11': 2100.99,
  'Phone Case': 14.99,
});

describe('CartService', () => {
  let cartService: CartService;
  let cart: Cart;

  beforeEach(() => {
    cartService = new CartService(catalog, pino({ level: 'silent' }));
    cart = new Map();
  });

  describe('addItem', () => {
    it('adds item to empty cart', () => {
      const qty = cartService.addItem(cart, 'Iphone 11', 2);

      expect(qty).toBe(2);
      expect([...cart.entries()]).toEqual([['Iphone 11', 2]]);
    });

    it('normalizes case and whitespace before lookup', () => {
      cartService.addItem(cart, '  iPHONE   11 ', 1);

      expect(cart.get('Iphone 11')).toBe(1);
      expect(cart.size).toBe(1);
    });

    it('merges quantities for same product', () => {
      cartService.addItem(cart, 'Phone Case', 3);
      cartService.addItem(cart, 'phone case', 4);

      expect(cart.get('Phone Case')).toBe(7);
    });

    it('two adds equal one add of the sum', () => {
      const single: Cart = new Map();
      cartService.addItem(cart, 'Iphone 11', 2);
      cartService.addItem(cart, 'Iphone 11', 5);
      cartService.addItem(single, 'Iphone 11', 7);

      expect(cart).toEqual(single);
    });

    it('rejects unknown products', () => {
      expect(() => cartService.addItem(cart, 'Pixel 4', 1)).toThrow(UnknownProductError);
      expect(cart.size).toBe(0);
    });

    it('rejects quantity < 1', () => {
      expect(() => cartService.addItem(cart, 'Iphone 11', 0)).toThrow(InvalidQuantityError);
      expect(() => cartService.addItem(cart, 'Iphone 11', -2)).toThrow(InvalidQuantityError);
      expect(cart.size).toBe(0);
    });

    it('rejects fractional quantities', () => {
      expect(() => cartService.addItem(cart, 'Iphone 11', 1.5)).toThrow(InvalidQuantityError);
    });

    it('rejects quantities above the maximum of 99', () => {
      expect(() => cartService.addItem(cart, 'Phone Case', 100)).toThrow('Quantity cannot exceed 99.');
      expect(cart.size).toBe(0);
    });

    it('rejects integers too large to count exactly', () => {
      expect(() => cartService.addItem(cart, 'Phone Case', Number.parseInt('9007199254740993', 10))).toThrow(
        'Quantity cannot exceed 99.'
      );
      expect(() => cartService.addItem(cart, 'Phone Case', 1e24)).toThrow(InvalidQuantityError);
      expect(cart.size).toBe(0);
    });

    it('rejects a merge that would exceed the maximum', () => {
      cartService.addItem(cart, 'Phone Case', 60);

      expect(() => cartService.addItem(cart, 'Phone Case', 40)).toThrow(
        "Total quantity for 'Phone Case' would exceed the maximum of 99."
      );
      expect(cart.get('Phone Case')).toBe(60);
      expect(cartService.addItem(cart, 'Phone Case', 39)).toBe(99);
    });

    it('honours a configured maximum', () => {
      const small = new CartService(catalog, pino({ level: 'silent' }), { maxQuantity: 5 });

      expect(small.addItem(cart, 'Iphone 11', 5)).toBe(5);
      expect(() => small.addItem(cart, 'Iphone 11', 1)).toThrow(InvalidQuantityError);
    });

    it('checks the product before the quantity', () => {
      expect(() => cartService.addItem(cart, 'Pixel 4', 0)).toThrow(UnknownProductError);
    });
  });

  describe('updateItem', () => {
    beforeEach(() => {
      cartService.addItem(cart, 'Iphone 11', 2);
      cartService.addItem(cart, 'Phone Case', 1);
    });

    it('replaces the quantity', () => {
      expect(cartService.updateItem(cart, 'iphone 11', 5)).toBe(5);
      expect(cart.get('Iphone 11')).toBe(5);
    });

    it('removes the entry on zero', () => {
      expect(cartService.updateItem(cart, 'Iphone 11', 0)).toBe(0);
      expect(cart.has('Iphone 11')).toBe(false);
      expect([...cart.keys()]).toEqual(['Phone Case']);
    });

    it('removed entries disappear from the rendered cart', () => {
      cartService.updateItem(cart, 'Iphone 11', 0);
      const view = renderCart(cart, catalog);

      expect(view.lines.some(line => line.startsWith('Iphone 11'))).toBe(false);
      expect(view.total).toBeCloseTo(14.99, 10);
    });

    it('throws NotInCart for products not in the cart', () => {
      const empty: Cart = new Map();
      expect(() => cartService.updateItem(empty, 'Iphone 11', 1)).toThrow(NotInCartError);
    });

    it('throws NotInCart before looking at the quantity', () => {
      cartService.updateItem(cart, 'Phone Case', 0);
      expect(() => cartService.updateItem(cart, 'Phone Case', -1)).toThrow(NotInCartError);
    });

    it('rejects negative quantities', () => {
      expect(() => cartService.updateItem(cart, 'Iphone 11', -1)).toThrow(InvalidQuantityError);
      expect(cart.get('Iphone 11')).toBe(2);
    });

    it('rejects quantities above the maximum', () => {
      expect(() => cartService.updateItem(cart, 'Iphone 11', 100)).toThrow('Quantity cannot exceed 99.');
      expect(() => cartService.updateItem(cart, 'Iphone 11', 2 ** 53 + 2)).toThrow(InvalidQuantityError);
      expect(cart.get('Iphone 11')).toBe(2);
      expect(cartService.updateItem(cart, 'Iphone 11', 99)).toBe(99);
    });
  });

  describe('lookups', () => {
    it('resolveProduct returns the canonical name', () => {
      expect(cartService.resolveProduct(' phone CASE')).toBe('Phone Case');
    });

    it('resolveProduct reports the normalized name', () => {
      expect(() => cartService.resolveProduct('pixel  4')).toThrow("Product 'Pixel 4' is not in the catalog.");
    });

    it('requireInCart throws for catalog products not yet added', () => {
      expect(() => cartService.requireInCart(cart, 'Iphone 11')).toThrow(NotInCartError);
    });
  });

  it('clearCart empties the cart', () => {
    cartService.addItem(cart, 'Iphone 11', 1);
    cartService.clearCart(cart);
    expect(cart.size).toBe(0);
  });

  it('errors carry machine codes', () => {
    try {
      cartService.addItem(cart, 'Pixel 4', 1);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownProductError);
      if (err instanceof UnknownProductError) {
        expect(err.code).toBe('UNKNOWN_PRODUCT');
        expect(err.name).toBe('UnknownProductError');
      }
    }
  });
});
