import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CartService } from '../src/domain/services/CartService.js';
import { StandardPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { InMemoryCartRepository } from '../src/infrastructure/repositories/InMemoryCartRepository.js';
import { KeyedMutex } from '../src/infrastructure/locks/KeyedMutex.js';
import {
  CartLimitExceededError,
  InvalidQuantityError,
  ItemNotFoundError,
  ValidationError,
} from '../src/domain/errors/index.js';
import { makeCatalog } from './fixtures.js';

describe('CartService', () => {
  let cartService: CartService;
  let repository: InMemoryCartRepository;
  let locks: KeyedMutex;

  beforeEach(() => {
    repository = new InMemoryCartRepository({ ttlMinutes: 5, enableAutoCleanup: false });
    locks = new KeyedMutex();
    cartService = new CartService(makeCatalog(), repository, new StandardPricingStrategy(), locks);
  });

  afterEach(() => {
    repository.destroy();
  });

  describe('getCart', () => {
    it('returns an empty cart for an unseen session', async () => {
      const cart = await cartService.getCart('session-1');

      expect(cart).toEqual({
        sessionId: 'session-1',
        lines: [],
        itemCount: 0,
        total: 0,
        createdAt: null,
        updatedAt: null,
      });
    });

    it('does not create a cart', async () => {
      await cartService.getCart('session-1');

      expect(repository.getCartCount()).toBe(0);
    });

    it('rejects an empty session id', async () => {
      await expect(cartService.getCart('  ')).rejects.toThrow(ValidationError);
    });
  });

  describe('addItem', () => {
    it('adds one unit by default', async () => {
      const cart = await cartService.addItem('session-1', 'pizza');

      expect(cart.lines).toHaveLength(1);
      expect(cart.lines[0].itemId).toBe('pizza');
      expect(cart.lines[0].quantity).toBe(1);
      expect(cart.total).toBe(5);
      expect(cart.createdAt).toBeInstanceOf(Date);
    });

    it('merges quantities for the same item', async () => {
      await cartService.addItem('session-1', 'pizza', 2);
      const cart = await cartService.addItem('session-1', 'pizza', 3);

      expect(cart.lines).toHaveLength(1);
      expect(cart.lines[0].quantity).toBe(5);
      expect(cart.lines[0].lineTotal).toBe(25);
    });

    it('keeps items in the order they were first added', async () => {
      await cartService.addItem('session-1', 'carrot');
      await cartService.addItem('session-1', 'pizza');
      const cart = await cartService.addItem('session-1', 'carrot');

      expect(cart.lines.map(line => line.itemId)).toEqual(['carrot', 'pizza']);
    });

    it('shows the summed quantity on a later get', async () => {
      await cartService.addItem('session-1', 'cookie', 2);
      await cartService.addItem('session-1', 'cookie', 4);
      const cart = await cartService.getCart('session-1');

      expect(cart.lines[0].quantity).toBe(6);
      expect(cart.itemCount).toBe(6);
      expect(cart.total).toBe(9);
    });

    it('computes the pizza and carrot total', async () => {
      await cartService.addItem('session-1', 'pizza', 2);
      await cartService.addItem('session-1', 'carrot', 3);
      const cart = await cartService.getCart('session-1');

      expect(cart.total).toBe(13);
    });

    it('throws ItemNotFoundError for an unknown item', async () => {
      await expect(cartService.addItem('session-1', 'broccoli')).rejects.toThrow(ItemNotFoundError);
      expect(repository.getCartCount()).toBe(0);
    });

    it('rejects zero, negative and fractional quantities', async () => {
      await expect(cartService.addItem('session-1', 'pizza', 0)).rejects.toThrow(InvalidQuantityError);
      await expect(cartService.addItem('session-1', 'pizza', -2)).rejects.toThrow(InvalidQuantityError);
      await expect(cartService.addItem('session-1', 'pizza', 1.5)).rejects.toThrow(InvalidQuantityError);
    });

    it('checks the item before the quantity', async () => {
      await expect(cartService.addItem('session-1', 'broccoli', 0)).rejects.toThrow(ItemNotFoundError);
    });

    it('rejects a merged quantity above the maximum and keeps the cart', async () => {
      const limited = new CartService(makeCatalog(), repository, new StandardPricingStrategy(), locks, {
        maxQuantity: 5,
        maxCartItems: 100,
      });
      await limited.addItem('session-1', 'pizza', 4);

      await expect(limited.addItem('session-1', 'pizza', 2)).rejects.toThrow(InvalidQuantityError);
      expect((await limited.getCart('session-1')).lines[0].quantity).toBe(4);
    });

    it('rejects a new entry above the maximum', async () => {
      const limited = new CartService(makeCatalog(), repository, new StandardPricingStrategy(), locks, {
        maxQuantity: 5,
      });

      await expect(limited.addItem('session-1', 'pizza', 6)).rejects.toThrow(InvalidQuantityError);
    });

    it('reports the line maximum before the cart-wide limit', async () => {
      await expect(cartService.addItem('session-1', 'pizza', 100)).rejects.toThrow(InvalidQuantityError);
      expect(repository.getCartCount()).toBe(0);
    });

    it('enforces the cart-wide item limit', async () => {
      const limited = new CartService(makeCatalog(), repository, new StandardPricingStrategy(), locks, {
        maxCartItems: 3,
      });
      await limited.addItem('session-1', 'pizza', 2);
      await limited.addItem('session-1', 'carrot', 1);

      await expect(limited.addItem('session-1', 'cookie', 1)).rejects.toThrow(CartLimitExceededError);
      expect((await limited.getCart('session-1')).itemCount).toBe(3);
    });

    it('keeps sessions independent', async () => {
      await cartService.addItem('session-1', 'pizza');
      await cartService.addItem('session-2', 'carrot', 2);

      expect((await cartService.getCart('session-1')).total).toBe(5);
      expect((await cartService.getCart('session-2')).total).toBe(2);
    });

    it('does not lose concurrent updates to one session', async () => {
      await Promise.all(
        Array.from({ length: 20 }, () => cartService.addItem('session-1', 'carrot'))
      );

      const cart = await cartService.getCart('session-1');
      expect(cart.lines[0].quantity).toBe(20);
      expect(locks.size).toBe(0);
    });
  });

  describe('removeItem', () => {
    it('decrements by one by default', async () => {
      await cartService.addItem('session-1', 'pizza', 3);
      const cart = await cartService.removeItem('session-1', 'pizza');

      expect(cart.lines[0].quantity).toBe(2);
      expect(cart.total).toBe(10);
    });

    it('drops the entry when the quantity reaches zero', async () => {
      await cartService.addItem('session-1', 'pizza', 2);
      await cartService.addItem('session-1', 'carrot');
      const cart = await cartService.removeItem('session-1', 'pizza', 2);

      expect(cart.lines.map(line => line.itemId)).toEqual(['carrot']);
      expect(cart.total).toBe(1);
    });

    it('drops the entry when removing more than is in the cart', async () => {
      await cartService.addItem('session-1', 'pizza', 2);
      const cart = await cartService.removeItem('session-1', 'pizza', 10);

      expect(cart.lines).toEqual([]);
      expect(cart.itemCount).toBe(0);
      expect(cart.total).toBe(0);
    });

    it('throws ItemNotFoundError when the item is not in the cart', async () => {
      await cartService.addItem('session-1', 'pizza');

      await expect(cartService.removeItem('session-1', 'carrot')).rejects.toThrow(ItemNotFoundError);
    });

    it('throws ItemNotFoundError for an unseen session', async () => {
      await expect(cartService.removeItem('session-1', 'pizza')).rejects.toThrow(
        "Item 'pizza' is not in the cart."
      );
    });

    it('rejects a non-positive quantity', async () => {
      await cartService.addItem('session-1', 'pizza');

      await expect(cartService.removeItem('session-1', 'pizza', 0)).rejects.toThrow(InvalidQuantityError);
    });
  });

  describe('clearCart', () => {
    it('empties a non-empty cart', async () => {
      await cartService.addItem('session-1', 'pizza', 2);
      await cartService.addItem('session-1', 'carrot');

      const cleared = await cartService.clearCart('session-1');
      const cart = await cartService.getCart('session-1');

      expect(cleared.lines).toEqual([]);
      expect(cart.lines).toEqual([]);
      expect(cart.total).toBe(0);
      expect(repository.getCartCount()).toBe(0);
    });

    it('is idempotent', async () => {
      await cartService.clearCart('session-1');
      const cart = await cartService.clearCart('session-1');

      expect(cart.itemCount).toBe(0);
    });

    it('leaves other sessions alone', async () => {
      await cartService.addItem('session-1', 'pizza');
      await cartService.addItem('session-2', 'pizza');

      await cartService.clearCart('session-1');

      expect((await cartService.getCart('session-2')).itemCount).toBe(1);
    });
  });
});
