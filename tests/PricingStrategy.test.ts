import { describe, it, expect } from 'vitest';
import { StandardPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { ItemNotFoundError } from '../src/domain/errors/index.js';
import { makeCatalog } from './fixtures.js';

describe('StandardPricingStrategy', () => {
  const strategy = new StandardPricingStrategy();
  const catalog = makeCatalog();

  it('prices an empty cart at zero', () => {
    const result = strategy.priceEntries([], catalog);

    expect(result.lines).toEqual([]);
    expect(result.itemCount).toBe(0);
    expect(result.total).toBe(0);
  });

  it('resolves name, image and price from the catalog', () => {
    const result = strategy.priceEntries([{ itemId: 'pizza', quantity: 2 }], catalog);

    expect(result.lines).toEqual([
      { itemId: 'pizza', name: 'Pizza', image: 'pizza.jpg', unitPrice: 5, quantity: 2, lineTotal: 10 },
    ]);
  });

  it('sums quantity times price across entries', () => {
    const result = strategy.priceEntries(
      [
        { itemId: 'pizza', quantity: 2 },
        { itemId: 'carrot', quantity: 3 },
      ],
      catalog
    );

    expect(result.itemCount).toBe(5);
    expect(result.total).toBe(13);
  });

  it('rounds to cents', () => {
    // 0.1 * 3 is 0.30000000000000004 in floating point
    const result = strategy.priceEntries([{ itemId: 'tea', quantity: 3 }], catalog);

    expect(result.lines[0].lineTotal).toBe(0.3);
    expect(result.total).toBe(0.3);
  });

  it('keeps entry order', () => {
    const result = strategy.priceEntries(
      [
        { itemId: 'carrot', quantity: 1 },
        { itemId: 'cookie', quantity: 1 },
        { itemId: 'pizza', quantity: 1 },
      ],
      catalog
    );

    expect(result.lines.map(line => line.itemId)).toEqual(['carrot', 'cookie', 'pizza']);
  });

  it('throws ItemNotFoundError for an unknown item', () => {
    expect(() => strategy.priceEntries([{ itemId: 'broccoli', quantity: 1 }], catalog)).toThrow(
      ItemNotFoundError
    );
  });
});
