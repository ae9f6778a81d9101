import type { Order } from '../../domain/models.js';
import type { IOrderRepository } from './IOrderRepository.js';

const copyOrder = (order: Order): Order => ({
  ...order,
  lines: order.lines.map(line => ({ ...line })),
});

// orders are immutable, so a second save under the same id is a bug
export class InMemoryOrderRepository implements IOrderRepository {
  private orders = new Map<string, Order>();

  async saveOrder(order: Order): Promise<Order> {
    if (this.orders.has(order.orderId)) {
      throw new Error(`Order '${order.orderId}' already exists`);
    }
    this.orders.set(order.orderId, copyOrder(order));
    return copyOrder(order);
  }

  async getOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  getOrderCount(): number {
    return this.orders.size;
  }
}
