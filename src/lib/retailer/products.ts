import type {
  IngredientNeed,
  ProductMatch,
  ProductSummary,
  RawProduct,
} from "@/types/retailer";

/** Product fields of a match, before recipe quantities are attached. */
export type MatchedProduct = Omit<
  ProductMatch,
  "ingredient" | "matched" | "neededQuantity" | "neededUnit"
>;

type WirePrice = number | string | null | undefined;

// ============================================================================
// Prices
// ============================================================================

/**
 * A usable price, or null. Zero and unparseable values count as absent,
 * the same as a missing field.
 */
export function parsePrice(value: WirePrice): number | null {
  if (value === null || value === undefined || value === "") return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) && n > 0 ? n : null;
}

export interface ResolvedPrice {
  price: number | null;
  priceRegular: number | null;
  onSale: boolean;
}

/**
 * Resolution order: sale price, then base price, then the generic price
 * field. The regular price skips the sale price.
 */
export function resolvePrice(info: RawProduct["price"]): ResolvedPrice {
  const sale = parsePrice(info?.salePrice);
  const base = parsePrice(info?.basePrice);
  const generic = parsePrice(info?.price);

  return {
    price: sale ?? base ?? generic,
    priceRegular: base ?? generic,
    onSale: sale !== null,
  };
}

// ============================================================================
// Aisle
// ============================================================================

/**
 * Normalize either a structured `{ aisle, side }` location or a free-text
 * one into a single string such as "Aisle 12 B".
 */
export function formatAisle(raw: RawProduct): string {
  const info = raw.aisleLocation || raw.aisle;
  if (!info) return "";

  if (typeof info === "string") {
    return info.replace(/\s+/g, " ").trim();
  }

  const parts = [info.aisle, info.side]
    .map((part) => (part === null || part === undefined ? "" : String(part).trim()))
    .filter((part) => part.length > 0);

  return parts.length > 0 ? `Aisle ${parts.join(" ")}` : "";
}

// ============================================================================
// Deep link
// ============================================================================

/**
 * Storefront search link for an ingredient. Informational only.
 */
export function buildSearchUrl(storefrontSearchUrl: string, ingredientName: string): string {
  const term = encodeURIComponent(ingredientName.trim()).replace(/%20/g, "+");
  return `${storefrontSearchUrl}?s=${term}`;
}

// ============================================================================
// Mapping
// ============================================================================

export function toMatchedProduct(
  raw: RawProduct,
  ingredientName: string,
  storefrontSearchUrl: string
): MatchedProduct {
  const { price, priceRegular, onSale } = resolvePrice(raw.price);

  return {
    upc: raw.upc ?? "",
    description: raw.description ?? raw.name ?? "",
    brand: raw.brand ?? "",
    size: raw.size ?? raw.packageSize ?? "",
    price,
    priceRegular,
    onSale,
    inStock: raw.inStock ?? true,
    aisle: formatAisle(raw),
    imageUrl: raw.imageUrl ?? raw.image ?? "",
    searchUrl: buildSearchUrl(storefrontSearchUrl, ingredientName),
  };
}

/**
 * Join a search outcome with the recipe line it was made for.
 * Needed quantity and unit come from the recipe whether or not a product
 * was found.
 */
export function toProductMatch(
  need: IngredientNeed,
  product: MatchedProduct | null
): ProductMatch {
  const base = {
    ingredient: need.name,
    neededQuantity: need.quantity,
    neededUnit: need.unit,
  };

  if (!product) {
    return {
      ...base,
      matched: false,
      upc: null,
      description: null,
      brand: null,
      size: null,
      price: null,
      priceRegular: null,
      onSale: false,
      inStock: null,
      aisle: null,
      imageUrl: null,
      searchUrl: null,
    };
  }

  return { ...base, ...product, matched: true };
}

/**
 * Compact view used by the search endpoint. No generic-price fallback here.
 */
export function summarizeProduct(raw: RawProduct): ProductSummary {
  const sale = parsePrice(raw.price?.salePrice);
  const base = parsePrice(raw.price?.basePrice);

  return {
    upc: raw.upc ?? "",
    description: raw.description ?? raw.name ?? "",
    brand: raw.brand ?? "",
    size: raw.size ?? raw.packageSize ?? "",
    price: sale ?? base,
    onSale: sale !== null,
  };
}
