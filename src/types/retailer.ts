/**
 * Types for the grocery retailer integration.
 *
 * Wire payloads from the retailer are parsed leniently (they change without
 * notice); our own API responses are strict Zod schemas with derived types.
 */

import { z } from "zod";

// ============================================================================
// Database row types (not validated at runtime, used for type hints)
// ============================================================================

export interface RetailerTokenRow {
  user_id: number;
  access_token: string;
  refresh_token: string | null;
  store_id: string | null;
  expires_at: Date | null;
  updated_at: Date;
}

export interface RecipeIngredientRow {
  recipe_id: number;
  sort_order: number;
  quantity: number | string | null;
  unit: string | null;
  raw_text: string | null;
  ingredient_id: number | null;
}

export interface IngredientRow {
  id: number;
  name: string | null;
}

// ============================================================================
// Domain records
// ============================================================================

export type CredentialSource = "stored" | "env";

export interface Credential {
  userId: number;
  accessToken: string;
  refreshToken: string | null;
  storeId: string | null;
  expiresAt: Date | null;
  source: CredentialSource;
}

/** One line of a recipe as the recipe store returns it. */
export interface RecipeIngredient {
  quantity: number | null;
  unit: string;
  rawText: string;
  ingredientId: number | null;
}

/** What the matcher searches for, in recipe order. */
export interface IngredientNeed {
  name: string;
  quantity: number | null;
  unit: string;
}

export interface ListItem {
  name: string;
  quantity: number;
}

// ============================================================================
// Retailer wire payloads (lenient)
// ============================================================================

// Prices arrive as numbers or numeric strings depending on the endpoint.
const wirePrice = z.union([z.number(), z.string()]).nullish();

export const RawPriceSchema = z
  .object({
    salePrice: wirePrice,
    basePrice: wirePrice,
    price: wirePrice,
  })
  .passthrough();

export const RawAisleSchema = z
  .object({
    aisle: z.union([z.string(), z.number()]).nullish(),
    side: z.string().nullish(),
  })
  .passthrough();

export const RawProductSchema = z
  .object({
    upc: z.string().nullish(),
    description: z.string().nullish(),
    name: z.string().nullish(),
    brand: z.string().nullish(),
    size: z.string().nullish(),
    packageSize: z.string().nullish(),
    price: RawPriceSchema.nullish(),
    aisleLocation: z.union([RawAisleSchema, z.string()]).nullish(),
    aisle: z.union([RawAisleSchema, z.string()]).nullish(),
    inStock: z.boolean().nullish(),
    imageUrl: z.string().nullish(),
    image: z.string().nullish(),
  })
  .passthrough();
export type RawProduct = z.infer<typeof RawProductSchema>;

export const SearchResponseSchema = z
  .object({ products: z.array(z.unknown()).nullish() })
  .passthrough();

export const RawListItemSchema = z.record(z.unknown());
export type RawListItem = z.infer<typeof RawListItemSchema>;

export const ShoppingListResponseSchema = z
  .object({ items: z.array(RawListItemSchema).nullish() })
  .passthrough();

// ============================================================================
// API Response Schemas (Zod) + Derived Types
// ============================================================================

export const ProductMatchSchema = z.object({
  ingredient: z.string(),
  matched: z.boolean(),
  upc: z.string().nullable(),
  description: z.string().nullable(),
  brand: z.string().nullable(),
  size: z.string().nullable(),
  price: z.number().nullable(),
  priceRegular: z.number().nullable(),
  onSale: z.boolean(),
  inStock: z.boolean().nullable(),
  aisle: z.string().nullable(),
  imageUrl: z.string().nullable(),
  searchUrl: z.string().nullable(),
  neededQuantity: z.number().nullable(),
  neededUnit: z.string(),
});
export type ProductMatch = z.infer<typeof ProductMatchSchema>;

export const ProductSummarySchema = z.object({
  upc: z.string(),
  description: z.string(),
  brand: z.string(),
  size: z.string(),
  price: z.number().nullable(),
  onSale: z.boolean(),
});
export type ProductSummary = z.infer<typeof ProductSummarySchema>;

export const MatchSummarySchema = z.object({
  recipeId: z.number().int(),
  storeId: z.string(),
  matched: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  estimatedCost: z.number(),
  items: z.array(ProductMatchSchema),
});
export type MatchSummary = z.infer<typeof MatchSummarySchema>;

export const AddToListResultSchema = z.object({
  success: z.boolean(),
  added: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  errors: z.array(z.string()),
  error: z.string().optional(),
});
export type AddToListResult = z.infer<typeof AddToListResultSchema>;

export const SyncResultSchema = z.object({
  success: z.boolean(),
  added: z.number().int().nonnegative(),
  skipped: z.array(z.string()),
  total: z.number().int().nonnegative(),
  errors: z.array(z.string()),
  estimatedCost: z.number(),
  message: z.string(),
  items: z.array(ProductMatchSchema),
});
export type SyncResult = z.infer<typeof SyncResultSchema>;

export const RetailerStatusSchema = z.object({
  connected: z.boolean(),
  expired: z.boolean(),
  storeId: z.string(),
  source: z.enum(["stored", "env"]).nullable(),
});
export type RetailerStatus = z.infer<typeof RetailerStatusSchema>;

export const ShoppingListSchema = z.object({
  items: z.array(RawListItemSchema),
});

// ============================================================================
// Request Schemas
// ============================================================================

export const UserQuerySchema = z.object({
  userId: z.coerce.number().int().positive().optional(),
});

export const RecipeParamsSchema = z.object({
  recipeId: z.coerce.number().int().positive(),
});

export const SaveTokenQuerySchema = UserQuerySchema.extend({
  authToken: z.string().min(1),
  refreshToken: z.string().default(""),
});

export const SearchQuerySchema = z.object({
  q: z.string().trim().min(1),
  limit: z.coerce.number().int().min(1).max(50).default(5),
});
