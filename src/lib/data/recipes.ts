import { db, type Queryable } from "@/lib/db";
import type {
  IngredientRow,
  RecipeIngredient,
  RecipeIngredientRow,
} from "@/types/retailer";

export interface RecipeStore {
  /** Ingredient lines of a recipe in display order; empty if the recipe is unknown. */
  getRecipeIngredients(recipeId: number): Promise<RecipeIngredient[]>;
  /** Display names of linked catalog ingredients, keyed by id. */
  getIngredientNames(ids: number[]): Promise<Map<number, string>>;
}

function toQuantity(value: number | string | null): number | null {
  if (value === null) return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

export function rowToRecipeIngredient(row: RecipeIngredientRow): RecipeIngredient {
  return {
    quantity: toQuantity(row.quantity),
    unit: row.unit ?? "",
    rawText: row.raw_text ?? "",
    ingredientId: row.ingredient_id,
  };
}

export function createRecipeStore(client: Queryable = db): RecipeStore {
  return {
    async getRecipeIngredients(recipeId) {
      const result = await client.query<RecipeIngredientRow>(
        `SELECT recipe_id, sort_order, quantity, unit, raw_text, ingredient_id
         FROM recipe_ingredients
         WHERE recipe_id = $1
         ORDER BY sort_order ASC`,
        [recipeId]
      );
      return result.rows.map(rowToRecipeIngredient);
    },

    async getIngredientNames(ids) {
      const unique = [...new Set(ids)];
      if (unique.length === 0) return new Map<number, string>();

      const result = await client.query<IngredientRow>(
        `SELECT id, name FROM ingredients WHERE id = ANY($1::int[])`,
        [unique]
      );
      return new Map<number, string>(result.rows.map((row) => [row.id, row.name ?? ""]));
    },
  };
}
