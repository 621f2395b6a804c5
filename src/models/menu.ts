/**
 * Menu models
 * The catalog side of ordering: what can be ordered, and where it belongs
 */

export const CATEGORIES = ["starters", "mainCourse", "sideDishes", "beverages"] as const;

export type Category = (typeof CATEGORIES)[number];

export const CATEGORY_LABELS: Record<Category, string> = {
  starters: "Starters",
  mainCourse: "Main course",
  sideDishes: "Side dishes",
  beverages: "Beverages",
};

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && CATEGORIES.some((c) => c === value);
}

/**
 * Immutable value: name is the identifying key within an order
 */
export interface MenuItem {
  readonly name: string;
  readonly price: number;
}

export function createMenuItem(name: string, price: number): MenuItem {
  return Object.freeze({ name, price });
}

export interface MenuEntry {
  id: string;
  name: string;
  aliases: string[]; // Alternative names a customer might use
  description: string;
  category: Category;
  price: number;
  available: boolean;
}

export interface Menu {
  restaurantName: string;
  currency: string;
  items: MenuEntry[];
}

/**
 * Order request representation - what a caller asks for by name
 */
export interface OrderRequestItem {
  itemName: string;
  quantity?: number;
  category?: Category; // Narrows matching when a name is ambiguous
}

export interface OrderRequest {
  items: OrderRequestItem[];
}
