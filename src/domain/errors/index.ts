// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ItemLocation = 'menu' | 'cart';

export class ItemNotFoundError extends DomainError {
  constructor(
    public readonly itemId: string,
    location: ItemLocation = 'menu'
  ) {
    super(`Item '${itemId}' is not in the ${location}.`, 'ITEM_NOT_FOUND', 404);
  }
}

export class InvalidQuantityError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_QUANTITY', 400);
  }
}

export class EmptyCartError extends DomainError {
  constructor() {
    super('Cart is empty! Please add some items first.', 'EMPTY_CART', 400);
  }
}

// total units across all entries, not distinct items
export class CartLimitExceededError extends DomainError {
  constructor(limit: number) {
    super(`Cart cannot contain more than ${limit} items.`, 'CART_LIMIT_EXCEEDED', 400);
  }
}

export class OrderNotFoundError extends DomainError {
  constructor(orderId: string) {
    super(`Order '${orderId}' not found.`, 'ORDER_NOT_FOUND', 404);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}
