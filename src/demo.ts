import { OrderService } from "./services/order-service.js";
import { menuFileService } from "./services/menu-file-service.js";
import { menuValidator } from "./services/menu-validator.js";
import { CATEGORIES, CATEGORY_LABELS, type OrderRequest } from "./models/menu.js";

/**
 * Demo script: compose a sample order and print its summary
 */
function main(): void {
  console.log("🍽️  Menu Order Builder - Demo\n");

  const menu = menuFileService.loadMenu();
  const counts = menuValidator.countByCategory(menu);
  console.log(`📋 ${menu.restaurantName}`);
  for (const category of CATEGORIES) {
    console.log(`   ${CATEGORY_LABELS[category]}: ${counts[category]} items`);
  }
  console.log("\n" + "=".repeat(50) + "\n");

  const orderService = new OrderService(menu);

  const request: OrderRequest = {
    items: [
      { itemName: "steak", quantity: 2 },
      { itemName: "fries" },
      { itemName: "beer", category: "beverages" },
    ],
  };

  console.log("📝 Order Request:");
  console.log(JSON.stringify(request, null, 2));
  console.log("");

  const result = orderService.composeOrder(request);

  if (result.warnings.length > 0) {
    console.log("⚠️  Warnings:");
    result.warnings.forEach((w) => console.log(`  - ${w}`));
    console.log("");
  }

  if (!result.success || !result.order) {
    console.log("❌ Order could not be composed:");
    result.errors.forEach((e) => console.log(`  - ${e}`));
    process.exitCode = 1;
    return;
  }

  const summary = orderService.summarize(result.order);

  console.log("✅ Order Summary:");
  for (const section of summary.sections) {
    if (section.lines.length === 0) continue;
    console.log(`   ${section.label}:`);
    for (const line of section.lines) {
      console.log(`   - ${line.quantity}x ${line.name}: ${menu.currency} ${line.amount.toFixed(2)}`);
    }
  }
  console.log("");
  console.log(`   Subtotal: ${menu.currency} ${summary.subtotal.toFixed(2)}`);
  console.log(`   Tax: ${menu.currency} ${summary.tax.toFixed(2)}`);
  console.log(`   Total: ${menu.currency} ${summary.total.toFixed(2)}`);

  if (result.errors.length > 0) {
    console.log("\n❌ Skipped items:");
    result.errors.forEach((e) => console.log(`  - ${e}`));
  }
}

main();
