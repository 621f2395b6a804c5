import type { Category, MenuItem } from "../models/menu.js";
import { Order, type OrderResult } from "../models/order.js";
import { config } from "../config/index.js";

export interface OrderBuilderOptions {
  /** Throw instead of ignoring calls made while no order is in progress */
  strict?: boolean;
}

export class NoOrderInProgressError extends Error {
  constructor(operation: string) {
    super(`${operation} called with no order in progress; call reset() first`);
    this.name = "NoOrderInProgressError";
  }
}

/**
 * Assembles an Order one unit at a time
 */
export class OrderBuilder {
  private order: Order | null = null;
  private strict: boolean;

  constructor(options: OrderBuilderOptions = {}) {
    this.strict = options.strict ?? config.builder.strict;
  }

  /**
   * Discard any in-progress order and start an empty one
   */
  reset(): void {
    this.order = new Order();
  }

  /**
   * Add one unit of an item. A repeated name in the same category bumps the
   * existing line's quantity and keeps its position.
   */
  addItem(item: MenuItem, category: Category): void {
    if (!this.order) {
      if (this.strict) {
        throw new NoOrderInProgressError("addItem");
      }
      console.warn(`[order-builder] Ignoring "${item.name}": no order in progress`);
      return;
    }

    this.order.add(item, category);
  }

  getResult(): OrderResult {
    if (!this.order) {
      if (this.strict) {
        throw new NoOrderInProgressError("getResult");
      }
      return { found: false };
    }
    return { found: true, order: this.order };
  }

  /**
   * Hand the order to the caller. Later additions are ignored until reset().
   */
  build(): OrderResult {
    const result = this.getResult();
    this.order = null;
    return result;
  }
}
