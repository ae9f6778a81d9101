import { Catalog } from '../src/domain/catalog/Catalog.js';
import type { Item } from '../src/domain/models.js';

export const testItems: Item[] = [
  { itemId: 'pizza', name: 'Pizza', price: 5.0, category: 'fun', image: 'pizza.jpg', description: 'Cheese pizza' },
  { itemId: 'cookie', name: 'Cookie', price: 1.5, category: 'fun', image: 'cookie.jpg' },
  { itemId: 'carrot', name: 'Carrot', price: 1.0, category: 'healthy', image: 'carrot.jpg' },
  { itemId: 'tea', name: 'Tea', price: 0.1, category: 'healthy', image: 'tea.jpg' },
];

export const makeCatalog = (): Catalog => new Catalog(testItems);
