import { CATEGORIES, type Category, type MenuItem } from "./menu.js";

/**
 * N units of one menu item
 */
export interface LineItem {
  readonly item: MenuItem;
  readonly quantity: number;
}

interface MutableLineItem {
  readonly item: MenuItem;
  quantity: number;
}

/**
 * A categorized order. Within a category, item names are unique.
 * Reads hand out frozen snapshots; only add() changes the lines.
 */
export class Order {
  private readonly starterLines: MutableLineItem[] = [];
  private readonly mainCourseLines: MutableLineItem[] = [];
  private readonly sideDishLines: MutableLineItem[] = [];
  private readonly beverageLines: MutableLineItem[] = [];

  get starters(): readonly LineItem[] {
    return this.lineItems("starters");
  }

  get mainCourse(): readonly LineItem[] {
    return this.lineItems("mainCourse");
  }

  get sideDishes(): readonly LineItem[] {
    return this.lineItems("sideDishes");
  }

  get beverages(): readonly LineItem[] {
    return this.lineItems("beverages");
  }

  private linesFor(category: Category): MutableLineItem[] {
    switch (category) {
      case "starters":
        return this.starterLines;
      case "mainCourse":
        return this.mainCourseLines;
      case "sideDishes":
        return this.sideDishLines;
      case "beverages":
        return this.beverageLines;
    }
  }

  lineItems(category: Category): readonly LineItem[] {
    return Object.freeze(
      this.linesFor(category).map((line) => Object.freeze({ item: line.item, quantity: line.quantity }))
    );
  }

  /**
   * Add one unit. A repeated name bumps the existing line in place.
   */
  add(item: MenuItem, category: Category): void {
    const lines = this.linesFor(category);
    const existing = lines.find((line) => line.item.name === item.name);

    if (existing) {
      existing.quantity += 1;
    } else {
      lines.push({ item, quantity: 1 });
    }
  }

  /**
   * Sum of unit price × quantity across every category
   */
  totalPrice(): number {
    return CATEGORIES.reduce(
      (sum, category) =>
        this.linesFor(category).reduce((acc, line) => acc + line.item.price * line.quantity, sum),
      0
    );
  }

  itemCount(): number {
    return CATEGORIES.reduce(
      (sum, category) => this.linesFor(category).reduce((acc, line) => acc + line.quantity, sum),
      0
    );
  }

  isEmpty(): boolean {
    return CATEGORIES.every((category) => this.linesFor(category).length === 0);
  }
}

export type OrderResult = { found: true; order: Order } | { found: false };

export interface OrderSummaryLine {
  name: string;
  quantity: number;
  unitPrice: number;
  amount: number;
}

export interface OrderSummarySection {
  category: Category;
  label: string;
  lines: OrderSummaryLine[];
}

export interface OrderSummary {
  sections: OrderSummarySection[];
  subtotal: number;
  tax: number;
  total: number;
}
