/**
 * Menu Order Builder
 *
 * Composes categorized restaurant orders one item at a time.
 *
 * Main exports:
 * - OrderBuilder: reset / addItem / getResult / build over a single Order
 * - OrderService: resolves requested names against a menu and prices the result
 * - MenuMatcher: fuzzy matching for requested names to menu entries
 */

// Services
export { OrderBuilder, NoOrderInProgressError } from "./services/order-builder.js";
export type { OrderBuilderOptions } from "./services/order-builder.js";
export { OrderService, MAX_ITEM_QUANTITY } from "./services/order-service.js";
export type { OrderServiceOptions, ComposeOrderResult } from "./services/order-service.js";
export { MenuMatcher } from "./services/menu-matcher.js";
export type { MatchResult } from "./services/menu-matcher.js";
export { menuValidator } from "./services/menu-validator.js";
export type { ValidationError, ValidationResult } from "./services/menu-validator.js";
export { menuFileService, MenuLoadError } from "./services/menu-file-service.js";

// Models
export { Order } from "./models/order.js";
export type {
  LineItem,
  OrderResult,
  OrderSummary,
  OrderSummaryLine,
  OrderSummarySection,
} from "./models/order.js";

export { CATEGORIES, CATEGORY_LABELS, createMenuItem, isCategory } from "./models/menu.js";
export type {
  Category,
  Menu,
  MenuEntry,
  MenuItem,
  OrderRequest,
  OrderRequestItem,
} from "./models/menu.js";

// Config
export { config } from "./config/index.js";
