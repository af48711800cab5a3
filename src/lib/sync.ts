import type { RecipeStore } from "@/lib/data/recipes";
import { NoMatchesError, RecipeNotFoundError } from "@/lib/errors";
import { countMatched, estimateCost, matchIngredients } from "@/lib/matcher";
import type { RetailerClient } from "@/lib/retailer/client";
import type {
  IngredientNeed,
  ListItem,
  MatchSummary,
  ProductMatch,
  RecipeIngredient,
  SyncResult,
} from "@/types/retailer";

export type SyncClient = Pick<
  RetailerClient,
  "searchBestMatch" | "addToShoppingList" | "defaultStoreId"
>;

export interface SyncOrchestratorDeps {
  recipes: RecipeStore;
  client: SyncClient;
}

/**
 * Linked catalog name when there is a non-blank one, otherwise the text the
 * line was parsed from.
 */
export function resolveIngredientName(
  line: RecipeIngredient,
  names: Map<number, string>
): string {
  const linked = line.ingredientId !== null ? (names.get(line.ingredientId) ?? "") : "";
  return linked.trim() ? linked : line.rawText;
}

/**
 * Split matches into list items and skipped ingredient names, keeping order.
 * Quantity is always 1; recipe amounts are not translated into packages.
 */
export function partitionMatches(matches: ProductMatch[]): {
  items: ListItem[];
  skipped: string[];
} {
  const items: ListItem[] = [];
  const skipped: string[] = [];

  for (const match of matches) {
    if (match.matched) {
      items.push({ name: match.description || match.ingredient, quantity: 1 });
    } else {
      skipped.push(match.ingredient);
    }
  }

  return { items, skipped };
}

export class SyncOrchestrator {
  private readonly recipes: RecipeStore;
  private readonly client: SyncClient;

  constructor(deps: SyncOrchestratorDeps) {
    this.recipes = deps.recipes;
    this.client = deps.client;
  }

  private async loadNeeds(recipeId: number): Promise<IngredientNeed[]> {
    const lines = await this.recipes.getRecipeIngredients(recipeId);
    if (lines.length === 0) {
      throw new RecipeNotFoundError(recipeId);
    }

    const linkedIds = lines
      .map((line) => line.ingredientId)
      .filter((id): id is number => id !== null);
    const names = await this.recipes.getIngredientNames(linkedIds);

    return lines.map((line) => ({
      name: resolveIngredientName(line, names),
      quantity: line.quantity,
      unit: line.unit,
    }));
  }

  /**
   * Match every ingredient of a recipe against the retailer catalog.
   * Throws RecipeNotFoundError when the recipe has no ingredients.
   */
  async matchRecipe(recipeId: number, storeId?: string): Promise<MatchSummary> {
    const needs = await this.loadNeeds(recipeId);
    const store = storeId || this.client.defaultStoreId;
    const items = await matchIngredients(this.client, needs, store);

    return {
      recipeId,
      storeId: store,
      matched: countMatched(items),
      total: items.length,
      estimatedCost: estimateCost(items),
      items,
    };
  }

  /**
   * Match a recipe and push the matched products to the remote list.
   * Throws RecipeNotFoundError or NoMatchesError when there is nothing to do.
   */
  async syncRecipe(recipeId: number, storeId?: string): Promise<SyncResult> {
    const summary = await this.matchRecipe(recipeId, storeId);
    const { items, skipped } = partitionMatches(summary.items);

    if (items.length === 0) {
      throw new NoMatchesError(recipeId, skipped);
    }

    const result = await this.client.addToShoppingList(items);
    console.info("[sync] Recipe pushed to shopping list", {
      recipeId,
      added: result.added,
      skipped: skipped.length,
      failed: result.errors.length,
    });

    return {
      success: result.success,
      added: result.added,
      skipped,
      total: result.total,
      errors: result.error ? [...result.errors, result.error] : result.errors,
      estimatedCost: summary.estimatedCost,
      message: `Added ${result.added} items to shopping list`,
      items: summary.items,
    };
  }
}
