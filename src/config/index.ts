import dotenv from "dotenv";

dotenv.config();

function parseRate(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== "" && Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  builder: {
    strict: process.env.ORDER_BUILDER_STRICT === "true",
  },
  pricing: {
    taxRate: parseRate(process.env.TAX_RATE, 0.13),
  },
  menu: {
    file: process.env.MENU_FILE || "",
  },
} as const;
