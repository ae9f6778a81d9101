import type { FastifyBaseLogger } from 'fastify';
import type { Cart } from '../../domain/models.js';
import type { ICartRepository } from './ICartRepository.js';

export interface InMemoryCartRepositoryOptions {
  /** Idle time after which a cart is evicted; 0 keeps carts forever */
  ttlMinutes?: number;
  enableAutoCleanup?: boolean;
  cleanupIntervalMs?: number;
  logger?: FastifyBaseLogger;
}

const copyCart = (cart: Cart): Cart => ({
  ...cart,
  entries: cart.entries.map(entry => ({ ...entry })),
});

// session carts in process memory, with idle TTL + periodic sweep
export class InMemoryCartRepository implements ICartRepository {
  private carts = new Map<string, Cart>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly ttlMinutes: number;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(options: InMemoryCartRepositoryOptions = {}) {
    this.ttlMinutes = options.ttlMinutes ?? 60;
    this.logger = options.logger;

    const autoCleanup = options.enableAutoCleanup ?? true;
    if (autoCleanup && this.ttlMinutes > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpiredCarts();
      }, options.cleanupIntervalMs ?? 60 * 1000);
      // the sweep alone must not keep the process alive
      this.cleanupInterval.unref();
    }
  }

  async getCart(sessionId: string): Promise<Cart | null> {
    const cart = this.carts.get(sessionId);
    if (!cart) return null;

    // an expired cart reads as a fresh session
    if (this.isExpired(cart)) {
      this.carts.delete(sessionId);
      return null;
    }

    return copyCart(cart);
  }

  async saveCart(cart: Cart): Promise<Cart> {
    this.carts.set(cart.sessionId, copyCart(cart));
    return copyCart(cart);
  }

  async deleteCart(sessionId: string): Promise<void> {
    this.carts.delete(sessionId);
  }

  private isExpired(cart: Cart): boolean {
    if (this.ttlMinutes <= 0) return false;

    const expirationTime = cart.updatedAt.getTime() + this.ttlMinutes * 60 * 1000;
    return Date.now() > expirationTime;
  }

  cleanupExpiredCarts(): number {
    const expiredSessionIds: string[] = [];

    // collect expired carts first to avoid modifying map during iteration
    for (const [sessionId, cart] of this.carts.entries()) {
      if (this.isExpired(cart)) {
        expiredSessionIds.push(sessionId);
      }
    }

    for (const sessionId of expiredSessionIds) {
      this.carts.delete(sessionId);
    }

    if (expiredSessionIds.length > 0) {
      this.logger?.info({ count: expiredSessionIds.length }, 'Cleaned up expired carts');
    }

    return expiredSessionIds.length;
  }

  getCartCount(): number {
    return this.carts.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
