import type { RetailerClient } from "@/lib/retailer/client";
import { toProductMatch } from "@/lib/retailer/products";
import type { IngredientNeed, ProductMatch } from "@/types/retailer";

export type BestMatchSource = Pick<RetailerClient, "searchBestMatch">;

/**
 * Match recipe lines to retailer products, one search per line.
 *
 * Searches run sequentially and result[i] always belongs to needs[i].
 * Repeated names are searched again: the same text can carry different
 * quantities within one recipe. A failed search yields an unmatched record.
 */
export async function matchIngredients(
  client: BestMatchSource,
  needs: IngredientNeed[],
  storeId?: string
): Promise<ProductMatch[]> {
  const results: ProductMatch[] = [];

  for (const need of needs) {
    const outcome = await client.searchBestMatch(need.name, storeId);
    results.push(toProductMatch(need, outcome.value));
  }

  return results;
}

/**
 * Sum of prices over matched records, missing prices counted as zero,
 * rounded to cents.
 */
export function estimateCost(matches: ProductMatch[]): number {
  const total = matches
    .filter((m) => m.matched)
    .reduce((sum, m) => sum + (m.price ?? 0), 0);
  return Math.round(total * 100) / 100;
}

export function countMatched(matches: ProductMatch[]): number {
  return matches.filter((m) => m.matched).length;
}
