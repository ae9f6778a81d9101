import type { Order } from '../../domain/models.js';

export interface IOrderRepository {
  saveOrder(order: Order): Promise<Order>;
  getOrder(orderId: string): Promise<Order | null>;
}
