import type { Cart, CartView } from '../models.js';
import type { ICatalog } from '../catalog/Catalog.js';
import type { ICartRepository } from '../../infrastructure/repositories/ICartRepository.js';
import type { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import type { KeyedMutex } from '../../infrastructure/locks/KeyedMutex.js';
import {
  CartLimitExceededError,
  InvalidQuantityError,
  ItemNotFoundError,
  ValidationError,
} from '../errors/index.js';

export interface CartLimits {
  maxQuantity?: number;
  maxCartItems?: number;
}

// cart operations per session; mutations go through the session lock
export class CartService {
  private maxQty: number;
  private maxItems: number;

  constructor(
    private readonly catalog: ICatalog,
    private readonly repository: ICartRepository,
    private readonly pricing: IPricingStrategy,
    private readonly locks: KeyedMutex,
    limits?: CartLimits
  ) {
    this.maxQty = limits?.maxQuantity ?? 99;
    this.maxItems = limits?.maxCartItems ?? 50;
  }

  async getCart(sessionId: string): Promise<CartView> {
    this.validateSessionId(sessionId);
    const cart = await this.repository.getCart(sessionId);
    return this.toView(sessionId, cart);
  }

  // merges quantities if the item is already in the cart
  async addItem(sessionId: string, itemId: string, quantity: number = 1): Promise<CartView> {
    this.validateSessionId(sessionId);
    const item = this.catalog.get(itemId);
    this.validateQuantity(quantity);

    return this.locks.runExclusive(sessionId, async () => {
      const now = new Date();
      const cart: Cart = (await this.repository.getCart(sessionId)) ?? {
        sessionId,
        entries: [],
        createdAt: now,
        updatedAt: now,
      };

      const existing = cart.entries.find(entry => entry.itemId === item.itemId);
      const newQty = (existing?.quantity ?? 0) + quantity;
      if (newQty > this.maxQty) {
        throw new InvalidQuantityError(
          existing
            ? `Total quantity for '${item.name}' would exceed maximum of ${this.maxQty}.`
            : `Quantity must be between 1 and ${this.maxQty}.`
        );
      }

      const itemCount = cart.entries.reduce((count, entry) => count + entry.quantity, 0);
      if (itemCount + quantity > this.maxItems) {
        throw new CartLimitExceededError(this.maxItems);
      }

      if (existing) {
        existing.quantity = newQty;
      } else {
        cart.entries.push({ itemId: item.itemId, quantity });
      }

      cart.updatedAt = now;
      return this.toView(sessionId, await this.repository.saveCart(cart));
    });
  }

  // removing more than is in the cart drops the entry, never goes negative
  async removeItem(sessionId: string, itemId: string, quantity: number = 1): Promise<CartView> {
    this.validateSessionId(sessionId);
    this.validateQuantity(quantity);

    return this.locks.runExclusive(sessionId, async () => {
      const cart = await this.repository.getCart(sessionId);
      const idx = cart ? cart.entries.findIndex(entry => entry.itemId === itemId) : -1;
      if (!cart || idx === -1) throw new ItemNotFoundError(itemId, 'cart');

      const entry = cart.entries[idx];
      if (entry.quantity > quantity) {
        entry.quantity -= quantity;
      } else {
        cart.entries.splice(idx, 1);
      }

      cart.updatedAt = new Date();
      return this.toView(sessionId, await this.repository.saveCart(cart));
    });
  }

  async clearCart(sessionId: string): Promise<CartView> {
    this.validateSessionId(sessionId);

    return this.locks.runExclusive(sessionId, async () => {
      await this.repository.deleteCart(sessionId);
      return this.toView(sessionId, null);
    });
  }

  private toView(sessionId: string, cart: Cart | null): CartView {
    const priced = this.pricing.priceEntries(cart?.entries ?? [], this.catalog);
    return {
      sessionId,
      ...priced,
      createdAt: cart?.createdAt ?? null,
      updatedAt: cart?.updatedAt ?? null,
    };
  }

  private validateSessionId(sessionId: string): void {
    if (typeof sessionId !== 'string' || sessionId.trim() === '') {
      throw new ValidationError('Session ID is required.');
    }
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidQuantityError('Quantity must be a positive whole number.');
    }
  }
}
