export type ItemCategory = 'healthy' | 'fun';

export const ITEM_CATEGORIES: readonly ItemCategory[] = ['healthy', 'fun'];

export interface Item {
  itemId: string;
  name: string;
  price: number;
  category: ItemCategory;
  image: string;
  description?: string;
}

export interface CartEntry {
  itemId: string;
  quantity: number;
}

// stored state; prices are never kept here, they come from the catalog on read
export interface Cart {
  sessionId: string;
  entries: CartEntry[];
  createdAt: Date;
  updatedAt: Date;
}

export interface PricedLine {
  itemId: string;
  name: string;
  image: string;
  unitPrice: number;
  quantity: number;
  lineTotal: number;
}

export interface PricedEntries {
  lines: PricedLine[];
  itemCount: number;
  total: number;
}

export interface CartView extends PricedEntries {
  sessionId: string;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface Order extends PricedEntries {
  orderId: string;
  sessionId: string;
  createdAt: Date;
}

export interface AddItemRequest {
  itemId: string;
  quantity?: number;
}
