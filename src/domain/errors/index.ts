// Base class for domain errors - the menu prints the message and re-prompts
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidQuantityError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_QUANTITY');
  }
}

export class UnknownProductError extends DomainError {
  constructor(productName: string) {
    super(
      `Product '${productName}' is not in the catalog.`,
      'UNKNOWN_PRODUCT'
    );
  }
}

export class NotInCartError extends DomainError {
  constructor(productName: string) {
    super(`Product '${productName}' is not in your cart.`, 'NOT_IN_CART');
  }
}
