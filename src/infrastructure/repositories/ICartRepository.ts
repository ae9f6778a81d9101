import type { Cart } from '../../domain/models.js';

export interface ICartRepository {
  getCart(sessionId: string): Promise<Cart | null>;
  saveCart(cart: Cart): Promise<Cart>;
  deleteCart(sessionId: string): Promise<void>;
}
