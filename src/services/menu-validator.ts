import { CATEGORIES, isCategory, type Category, type Menu, type MenuEntry, type MenuItem } from "../models/menu.js";

export interface ValidationError {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ParseMenuResult {
  menu?: Menu;
  errors: ValidationError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function isValidPrice(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * Menu validation service
 */
export const menuValidator = {
  /**
   * Validate a single item value before it goes into an order
   */
  validateItem(item: MenuItem): ValidationResult {
    const errors: ValidationError[] = [];

    if (!isNonEmptyString(item.name)) {
      errors.push({ field: "name", message: "Name is required" });
    }

    if (!isValidPrice(item.price)) {
      errors.push({ field: "price", message: "Price must be a non-negative number" });
    }

    return { valid: errors.length === 0, errors };
  },

  /**
   * Validate untyped menu data (usually parsed JSON) and narrow it to a Menu
   */
  parseMenu(raw: unknown): ParseMenuResult {
    const errors: ValidationError[] = [];

    if (!isRecord(raw)) {
      errors.push({ field: "", message: "Menu must be an object" });
      return { errors };
    }

    if (!isNonEmptyString(raw.restaurantName)) {
      errors.push({ field: "restaurantName", message: "Restaurant name is required" });
    }

    if (typeof raw.currency !== "string" || !/^[A-Z]{3}$/.test(raw.currency)) {
      errors.push({ field: "currency", message: "Currency must be a three-letter code" });
    }

    if (!Array.isArray(raw.items)) {
      errors.push({ field: "items", message: "Items must be an array" });
      return { errors };
    }

    const items: MenuEntry[] = [];
    const ids = new Set<string>();
    const namesByCategory = new Map<string, Set<string>>();

    raw.items.forEach((entry: unknown, index: number) => {
      const field = `items[${index}]`;
      const before = errors.length;

      if (!isRecord(entry)) {
        errors.push({ field, message: "Item must be an object" });
        return;
      }

      const { id, name, price, category, aliases, description, available } = entry;

      if (!isNonEmptyString(id)) {
        errors.push({ field: `${field}.id`, message: "ID is required" });
      } else if (!/^[A-Z0-9-]+$/.test(id)) {
        errors.push({ field: `${field}.id`, message: "ID must be uppercase letters, numbers, and hyphens only" });
      } else if (ids.has(id)) {
        errors.push({ field: `${field}.id`, message: "An item with this ID already exists" });
      } else {
        ids.add(id);
      }

      if (!isCategory(category)) {
        errors.push({
          field: `${field}.category`,
          message: `Category must be one of: ${CATEGORIES.join(", ")}`,
        });
      }

      if (!isNonEmptyString(name)) {
        errors.push({ field: `${field}.name`, message: "Name is required" });
      } else if (name.length > 100) {
        errors.push({ field: `${field}.name`, message: "Name must be 100 characters or less" });
      } else if (isCategory(category)) {
        // Names key line items, so they must be unique per category
        const names = namesByCategory.get(category) ?? new Set<string>();
        if (names.has(name)) {
          errors.push({ field: `${field}.name`, message: `Duplicate name "${name}" in ${category}` });
        }
        names.add(name);
        namesByCategory.set(category, names);
      }

      if (!isValidPrice(price)) {
        errors.push({ field: `${field}.price`, message: "Price must be a non-negative number" });
      }

      if (
        aliases !== undefined &&
        !(Array.isArray(aliases) && aliases.every((a: unknown) => typeof a === "string"))
      ) {
        errors.push({ field: `${field}.aliases`, message: "Aliases must be a list of strings" });
      }

      if (description !== undefined && typeof description !== "string") {
        errors.push({ field: `${field}.description`, message: "Description must be a string" });
      }

      if (available !== undefined && typeof available !== "boolean") {
        errors.push({ field: `${field}.available`, message: "Available must be true or false" });
      }

      if (
        errors.length === before &&
        isNonEmptyString(id) &&
        isNonEmptyString(name) &&
        isValidPrice(price) &&
        isCategory(category)
      ) {
        items.push({
          id,
          name,
          price,
          category,
          aliases: Array.isArray(aliases) ? aliases.filter((a: unknown): a is string => typeof a === "string") : [],
          description: typeof description === "string" ? description : "",
          available: typeof available === "boolean" ? available : true,
        });
      }
    });

    if (errors.length > 0 || !isNonEmptyString(raw.restaurantName) || typeof raw.currency !== "string") {
      return { errors };
    }

    return {
      menu: { restaurantName: raw.restaurantName, currency: raw.currency, items },
      errors,
    };
  },

  /**
   * Count the items filed under a category
   */
  countByCategory(menu: Menu): Record<Category, number> {
    const counts: Record<Category, number> = { starters: 0, mainCourse: 0, sideDishes: 0, beverages: 0 };
    for (const item of menu.items) {
      counts[item.category] += 1;
    }
    return counts;
  },
};
