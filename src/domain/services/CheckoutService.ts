import { v4 as uuidv4 } from 'uuid';
import type { Order } from '../models.js';
import type { ICatalog } from '../catalog/Catalog.js';
import type { ICartRepository } from '../../infrastructure/repositories/ICartRepository.js';
import type { IOrderRepository } from '../../infrastructure/repositories/IOrderRepository.js';
import type { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import type { KeyedMutex } from '../../infrastructure/locks/KeyedMutex.js';
import { EmptyCartError, OrderNotFoundError, ValidationError } from '../errors/index.js';

/**
 * Turns a session's cart into an immutable order.
 *
 * Runs under the same session lock as {@link CartService}, so a checkout never
 * interleaves with an add or remove. The order is stored before the cart is
 * deleted; if pricing or storing fails the cart is left as it was.
 */
export class CheckoutService {
  constructor(
    private readonly catalog: ICatalog,
    private readonly carts: ICartRepository,
    private readonly orders: IOrderRepository,
    private readonly pricing: IPricingStrategy,
    private readonly locks: KeyedMutex
  ) {}

  async checkout(sessionId: string): Promise<Order> {
    this.validateSessionId(sessionId);

    return this.locks.runExclusive(sessionId, async () => {
      const cart = await this.carts.getCart(sessionId);
      if (!cart || cart.entries.length === 0) throw new EmptyCartError();

      const priced = this.pricing.priceEntries(cart.entries, this.catalog);
      const order = await this.orders.saveOrder({
        orderId: uuidv4(),
        sessionId,
        ...priced,
        createdAt: new Date(),
      });

      await this.carts.deleteCart(sessionId);
      return order;
    });
  }

  // orders are only visible to the session that placed them
  async getOrder(sessionId: string, orderId: string): Promise<Order> {
    this.validateSessionId(sessionId);

    const order = await this.orders.getOrder(orderId);
    if (!order || order.sessionId !== sessionId) throw new OrderNotFoundError(orderId);
    return order;
  }

  private validateSessionId(sessionId: string): void {
    if (typeof sessionId !== 'string' || sessionId.trim() === '') {
      throw new ValidationError('Session ID is required.');
    }
  }
}
