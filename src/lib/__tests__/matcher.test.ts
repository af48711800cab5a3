import { describe, test, expect, vi } from "vitest";
import {
  countMatched,
  estimateCost,
  matchIngredients,
  type BestMatchSource,
} from "@/lib/matcher";
import type { RetailerOutcome } from "@/lib/retailer/client";
import { toProductMatch, type MatchedProduct } from "@/lib/retailer/products";
import type { IngredientNeed } from "@/types/retailer";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function product(description: string, price: number | null): MatchedProduct {
  return {
    upc: `upc-${description}`,
    description,
    brand: "",
    size: "",
    price,
    priceRegular: price,
    onSale: false,
    inStock: true,
    aisle: "",
    imageUrl: "",
    searchUrl: `https://shop.test/search.html?s=${description}`,
  };
}

/** Fake client answering from a name → product table. */
function fakeClient(catalog: Record<string, MatchedProduct | "fail">) {
  const searchBestMatch = vi.fn(
    async (name: string): Promise<RetailerOutcome<MatchedProduct | null>> => {
      const hit = catalog[name];
      if (hit === "fail") {
        return { ok: false, failure: "TRANSPORT_FAILURE", detail: "HTTP 500", value: null };
      }
      return { ok: true, value: hit ?? null };
    }
  );
  const client: BestMatchSource = { searchBestMatch };
  return { client, searchBestMatch };
}

const needs: IngredientNeed[] = [
  { name: "flour", quantity: 2, unit: "cups" },
  { name: "saffron", quantity: 0.5, unit: "tsp" },
  { name: "eggs", quantity: 3, unit: "" },
];

// ===========================================================================
// matchIngredients
// ===========================================================================

describe("matchIngredients", () => {
  test("one result per input, in input order", async () => {
    const { client, searchBestMatch } = fakeClient({
      flour: product("AP Flour", 3.29),
      eggs: product("Large Eggs", 2.99),
    });

    const results = await matchIngredients(client, needs, "217");

    expect(results.map((r) => [r.ingredient, r.matched])).toEqual([
      ["flour", true],
      ["saffron", false],
      ["eggs", true],
    ]);
    expect(searchBestMatch.mock.calls.map((c) => c[0])).toEqual(["flour", "saffron", "eggs"]);
    expect(searchBestMatch).toHaveBeenCalledWith("flour", "217");
  });

  test("needed quantity and unit follow the input regardless of outcome", async () => {
    const { client } = fakeClient({ flour: product("AP Flour", 3.29), saffron: "fail" });

    const results = await matchIngredients(client, needs);

    expect(results).toHaveLength(needs.length);
    results.forEach((r, i) => {
      expect(r.neededQuantity).toBe(needs[i].quantity);
      expect(r.neededUnit).toBe(needs[i].unit);
    });
    expect(results[1]).toEqual(toProductMatch(needs[1], null));
  });

  test("repeated names are searched each time", async () => {
    const { client, searchBestMatch } = fakeClient({ butter: product("Butter", 4.49) });

    const results = await matchIngredients(client, [
      { name: "butter", quantity: 1, unit: "tbsp" },
      { name: "butter", quantity: 0.5, unit: "cup" },
    ]);

    expect(searchBestMatch).toHaveBeenCalledTimes(2);
    expect(results.map((r) => r.neededUnit)).toEqual(["tbsp", "cup"]);
    expect(results.every((r) => r.matched)).toBe(true);
  });

  test("empty input", async () => {
    const { client, searchBestMatch } = fakeClient({});
    expect(await matchIngredients(client, [])).toEqual([]);
    expect(searchBestMatch).not.toHaveBeenCalled();
  });
});

// ===========================================================================
// Aggregates
// ===========================================================================

describe("estimateCost", () => {
  test("sums matched prices and rounds to cents", () => {
    const matches = [
      toProductMatch(needs[0], product("AP Flour", 1.99)),
      toProductMatch(needs[1], null),
      toProductMatch(needs[2], product("Large Eggs", 3.5)),
    ];
    expect(estimateCost(matches)).toBe(5.49);
    expect(countMatched(matches)).toBe(2);
  });

  test("a matched product without a price counts as zero", () => {
    const matches = [
      toProductMatch(needs[0], product("AP Flour", null)),
      toProductMatch(needs[2], product("Large Eggs", 0.1)),
      toProductMatch(needs[2], product("Large Eggs", 0.2)),
    ];
    expect(estimateCost(matches)).toBe(0.3);
  });

  test("nothing matched", () => {
    expect(estimateCost([toProductMatch(needs[1], null)])).toBe(0);
  });
});
