import type { Logger } from 'pino';
import type { Cart, Catalog } from '../models.js';
import { normalizeProductName } from '../catalog.js';
import {
  InvalidQuantityError,
  NotInCartError,
  UnknownProductError,
} from '../errors/index.js';

// cart mutations against a fixed catalog; the cart itself belongs to the session
export class CartService {
  private maxQty: number;

  constructor(
    private readonly catalog: Catalog,
    private readonly logger: Logger,
    config?: {
      maxQuantity?: number;
    }
  ) {
    this.maxQty = config?.maxQuantity ?? 99;
  }

  // returns the catalog's canonical name for `name`
  resolveProduct(name: string): string {
    const productName = normalizeProductName(name);
    if (!this.catalog.has(productName)) {
      throw new UnknownProductError(productName || name);
    }
    return productName;
  }

  requireInCart(cart: Cart, name: string): string {
    const productName = normalizeProductName(name);
    if (!cart.has(productName)) {
      throw new NotInCartError(productName || name);
    }
    return productName;
  }

  // merges quantities if product already exists
  addItem(cart: Cart, name: string, quantity: number): number {
    const productName = this.resolveProduct(name);
    this.validateQuantity(quantity);

    const newQty = (cart.get(productName) ?? 0) + quantity;
    if (!Number.isSafeInteger(newQty) || newQty > this.maxQty) {
      throw new InvalidQuantityError(
        `Total quantity for '${productName}' would exceed the maximum of ${this.maxQty}.`
      );
    }
    cart.set(productName, newQty);

    this.logger.debug({ productName, quantity, cartQuantity: newQty }, 'item added');
    return newQty;
  }

  // zero removes the entry; returns the quantity left in the cart
  updateItem(cart: Cart, name: string, newQuantity: number): number {
    const productName = this.requireInCart(cart, name);

    if (!Number.isInteger(newQuantity)) {
      throw new InvalidQuantityError('Quantity must be a whole number.');
    }
    if (newQuantity < 0) {
      throw new InvalidQuantityError('Quantity cannot be negative.');
    }
    if (!Number.isSafeInteger(newQuantity) || newQuantity > this.maxQty) {
      throw new InvalidQuantityError(`Quantity cannot exceed ${this.maxQty}.`);
    }

    if (newQuantity === 0) {
      cart.delete(productName);
      this.logger.debug({ productName }, 'item removed');
      return 0;
    }

    cart.set(productName, newQuantity);
    this.logger.debug({ productName, cartQuantity: newQuantity }, 'item updated');
    return newQuantity;
  }

  clearCart(cart: Cart): void {
    cart.clear(); // keep the session alive but empty
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity)) {
      throw new InvalidQuantityError('Quantity must be a whole number.');
    }
    if (quantity <= 0) {
      throw new InvalidQuantityError('Quantity must be greater than zero.');
    }
    if (!Number.isSafeInteger(quantity) || quantity > this.maxQty) {
      throw new InvalidQuantityError(`Quantity cannot exceed ${this.maxQty}.`);
    }
  }
}
