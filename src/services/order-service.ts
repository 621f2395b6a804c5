import { CATEGORIES, CATEGORY_LABELS, createMenuItem, type Menu, type OrderRequest } from "../models/menu.js";
import type { Order, OrderSummary } from "../models/order.js";
import { OrderBuilder, type OrderBuilderOptions } from "./order-builder.js";
import { MenuMatcher } from "./menu-matcher.js";
import { menuValidator } from "./menu-validator.js";
import { config } from "../config/index.js";

export const MAX_ITEM_QUANTITY = 99;

export interface OrderServiceOptions extends OrderBuilderOptions {
  taxRate?: number;
}

export interface ComposeOrderResult {
  success: boolean;
  order?: Order;
  errors: string[];
  warnings: string[];
}

/**
 * High-level order service: turns requests by name into a built order
 */
export class OrderService {
  private builder: OrderBuilder;
  private matcher: MenuMatcher;
  private taxRate: number;

  constructor(menu: Menu, options: OrderServiceOptions = {}) {
    this.builder = new OrderBuilder(options);
    this.matcher = new MenuMatcher(menu);
    this.taxRate = options.taxRate ?? config.pricing.taxRate;
  }

  /**
   * Compose an order:
   * 1. Resolve each requested name against the menu
   * 2. Add one unit per requested quantity
   * 3. Take the finished order from the builder
   */
  composeOrder(request: OrderRequest): ComposeOrderResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    let resolvedCount = 0;

    this.builder.reset();

    for (const requested of request.items) {
      const quantity = requested.quantity ?? 1;
      if (!Number.isInteger(quantity) || quantity < 1) {
        errors.push(`Invalid quantity ${quantity} for "${requested.itemName}"`);
        continue;
      }
      if (quantity > MAX_ITEM_QUANTITY) {
        errors.push(`Quantity ${quantity} for "${requested.itemName}" exceeds the maximum of ${MAX_ITEM_QUANTITY}`);
        continue;
      }

      const itemMatch = this.matcher.findItem(requested.itemName, requested.category);
      if (!itemMatch.match) {
        errors.push(`Could not find menu item: "${requested.itemName}"`);
        continue;
      }

      if (itemMatch.confidence < 0.7) {
        warnings.push(
          `Low confidence match for "${requested.itemName}" -> "${itemMatch.match.name}" (${Math.round(itemMatch.confidence * 100)}%)`
        );
      }

      const entry = itemMatch.match;
      const item = createMenuItem(entry.name, entry.price);
      const validation = menuValidator.validateItem(item);
      if (!validation.valid) {
        errors.push(
          `Menu item "${entry.name}" is invalid: ${validation.errors.map((e) => e.message).join(", ")}`
        );
        continue;
      }

      for (let i = 0; i < quantity; i++) {
        this.builder.addItem(item, entry.category);
      }
      resolvedCount++;
    }

    const result = this.builder.build();

    if (resolvedCount === 0 || !result.found) {
      errors.push("No valid items in order");
      return { success: false, errors, warnings };
    }

    return { success: true, order: result.order, errors, warnings };
  }

  /**
   * Priced breakdown of an order, one section per category
   */
  summarize(order: Order): OrderSummary {
    const sections = CATEGORIES.map((category) => ({
      category,
      label: CATEGORY_LABELS[category],
      lines: order.lineItems(category).map((line) => ({
        name: line.item.name,
        quantity: line.quantity,
        unitPrice: line.item.price,
        amount: line.item.price * line.quantity,
      })),
    }));

    const subtotal = order.totalPrice();
    const tax = subtotal * this.taxRate;

    return { sections, subtotal, tax, total: subtotal + tax };
  }
}
