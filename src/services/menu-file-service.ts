import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { Menu } from "../models/menu.js";
import { menuValidator, type ValidationError } from "./menu-validator.js";
import { config } from "../config/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Same relative location from src/services and dist/services
export const DEFAULT_MENU_FILE_PATH = path.resolve(__dirname, "../../data/menu.json");

export class MenuLoadError extends Error {
  readonly errors: ValidationError[];

  constructor(filePath: string, errors: ValidationError[]) {
    const details = errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message)).join("; ");
    super(`Invalid menu file ${filePath}: ${details}`);
    this.name = "MenuLoadError";
    this.errors = errors;
  }
}

/**
 * Service for reading the menu JSON file
 */
export const menuFileService = {
  resolvePath(filePath?: string): string {
    return path.resolve(filePath || config.menu.file || DEFAULT_MENU_FILE_PATH);
  },

  /**
   * Load and validate a menu. Throws MenuLoadError when unreadable or invalid.
   */
  loadMenu(filePath?: string): Menu {
    const menuPath = this.resolvePath(filePath);
    let text: string;
    try {
      text = fs.readFileSync(menuPath, "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new MenuLoadError(menuPath, [{ field: "", message: `Could not read file (${message})` }]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new MenuLoadError(menuPath, [{ field: "", message: `Not valid JSON (${message})` }]);
    }

    const { menu, errors } = menuValidator.parseMenu(raw);
    if (!menu) {
      throw new MenuLoadError(menuPath, errors);
    }

    console.log(`[menu] Loaded ${menu.items.length} items for ${menu.restaurantName} from ${menuPath}`);
    return menu;
  },
};
