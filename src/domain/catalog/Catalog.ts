import type { Item, ItemCategory } from '../models.js';
import { ItemNotFoundError } from '../errors/index.js';

export interface ICatalog {
  list(): readonly Item[];
  listByCategory(category: ItemCategory): Item[];
  find(itemId: string): Item | undefined;
  get(itemId: string): Item;
}

// read-only after construction; items are frozen so callers can't mutate prices
export class Catalog implements ICatalog {
  private readonly items: readonly Item[];
  private readonly byId = new Map<string, Item>();

  constructor(items: Item[]) {
    const frozen: Item[] = [];

    for (const item of items) {
      if (this.byId.has(item.itemId)) {
        throw new Error(`Duplicate catalog item id '${item.itemId}'`);
      }
      if (!(item.price > 0)) {
        throw new Error(`Catalog item '${item.itemId}' must have a positive price`);
      }

      const copy = Object.freeze({ ...item });
      this.byId.set(copy.itemId, copy);
      frozen.push(copy);
    }

    this.items = Object.freeze(frozen);
  }

  list(): readonly Item[] {
    return this.items;
  }

  listByCategory(category: ItemCategory): Item[] {
    return this.items.filter(item => item.category === category);
  }

  find(itemId: string): Item | undefined {
    return this.byId.get(itemId);
  }

  get(itemId: string): Item {
    const item = this.byId.get(itemId);
    if (!item) throw new ItemNotFoundError(itemId);
    return item;
  }
}
