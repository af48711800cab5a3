/**
 * Match a recipe against the retailer catalog and, unless --dry-run,
 * push the matched products to the user's shopping list.
 *
 * Usage:
 *   npx tsx scripts/sync-recipe.ts 42                  # match + add to list
 *   npx tsx scripts/sync-recipe.ts 42 --dry-run        # match only
 *   npx tsx scripts/sync-recipe.ts 42 --user 3 --store 104
 */

import { config } from "dotenv";
config({ path: ".env.local" });

import { closePool } from "../src/lib/db";
import { AppError } from "../src/lib/errors";
import { getRetailerContext } from "../src/lib/services";
import type { ProductMatch } from "../src/types/retailer";

function parseArgs() {
  const args = process.argv.slice(2);
  const dryRun = args.includes("--dry-run");

  const userIdx = args.indexOf("--user");
  const userId = userIdx >= 0 ? Number(args[userIdx + 1]) : undefined;

  const storeIdx = args.indexOf("--store");
  const storeId = storeIdx >= 0 ? args[storeIdx + 1] : undefined;

  // First bare number that is not the value of a flag
  const flagValues = new Set([userIdx + 1, storeIdx + 1].filter((i) => i > 0));
  const recipeArg = args.find((a, i) => !flagValues.has(i) && /^\d+$/.test(a));
  const recipeId = Number(recipeArg);

  return { recipeId, userId, storeId, dryRun };
}

function formatPrice(price: number | null): string {
  return price === null ? "-" : `$${price.toFixed(2)}`;
}

function printMatches(items: ProductMatch[]) {
  for (const item of items) {
    const need = [item.neededQuantity ?? "", item.neededUnit].join(" ").trim();
    const label = `${item.ingredient}${need ? ` (${need})` : ""}`;
    if (item.matched) {
      const sale = item.onSale ? " [sale]" : "";
      const aisle = item.aisle ? `  ${item.aisle}` : "";
      console.log(`  ✓ ${label} → ${item.description} ${formatPrice(item.price)}${sale}${aisle}`);
    } else {
      console.log(`  ✗ ${label}`);
    }
  }
}

async function main() {
  const { recipeId, userId, storeId, dryRun } = parseArgs();
  if (!Number.isInteger(recipeId) || recipeId <= 0) {
    console.error("Usage: npx tsx scripts/sync-recipe.ts <recipeId> [--user N] [--store ID] [--dry-run]");
    process.exit(1);
  }
  if (userId !== undefined && (!Number.isInteger(userId) || userId <= 0)) {
    console.error("--user must be a positive integer");
    process.exit(1);
  }

  const { client, orchestrator } = await getRetailerContext(userId);

  console.log(`\nSync recipe ${recipeId}`);
  console.log(`  Configured: ${client.isConfigured()}`);
  console.log(`  Store: ${storeId ?? client.defaultStoreId}`);
  console.log(`  Dry run: ${dryRun}`);
  console.log("");

  try {
    if (dryRun) {
      const summary = await orchestrator.matchRecipe(recipeId, storeId);
      printMatches(summary.items);
      console.log("\n--- Summary ---");
      console.log(`Matched: ${summary.matched}/${summary.total}`);
      console.log(`Estimated cost: ${formatPrice(summary.estimatedCost)}`);
    } else {
      const result = await orchestrator.syncRecipe(recipeId, storeId);
      printMatches(result.items);
      console.log("\n--- Summary ---");
      console.log(result.message);
      console.log(`Skipped: ${result.skipped.length > 0 ? result.skipped.join(", ") : "none"}`);
      for (const error of result.errors) {
        console.log(`  error: ${error}`);
      }
      console.log(`Estimated cost: ${formatPrice(result.estimatedCost)}`);
    }
  } catch (err) {
    if (err instanceof AppError) {
      console.error(`${err.code}: ${err.message}`);
      await closePool();
      process.exit(2);
    }
    throw err;
  }

  await closePool();
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
