import type { CartEntry, PricedEntries } from '../models.js';
import type { ICatalog } from '../catalog/Catalog.js';

export interface IPricingStrategy {
  priceEntries(entries: readonly CartEntry[], catalog: ICatalog): PricedEntries;
}

// rounding to 2 decimals to avoid floating point weirdness
const toCents = (amount: number): number => Math.round(amount * 100) / 100;

// standard pricing - current menu price times quantity
export class StandardPricingStrategy implements IPricingStrategy {
  priceEntries(entries: readonly CartEntry[], catalog: ICatalog): PricedEntries {
    const lines = entries.map(entry => {
      const item = catalog.get(entry.itemId);
      return {
        itemId: item.itemId,
        name: item.name,
        image: item.image,
        unitPrice: item.price,
        quantity: entry.quantity,
        lineTotal: toCents(item.price * entry.quantity),
      };
    });

    return {
      lines,
      itemCount: lines.reduce((count, line) => count + line.quantity, 0),
      total: toCents(lines.reduce((sum, line) => sum + line.lineTotal, 0)),
    };
  }
}
