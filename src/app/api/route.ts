import { NextResponse } from "next/server";

/**
 * API Discovery Endpoint
 * Returns basic API info and available endpoints
 */
export async function GET() {
  return NextResponse.json({
    name: "Larder Sync API",
    version: "0.1.0",
    description: "Match recipe ingredients to grocery products and push them to a retailer shopping list",
    endpoints: {
      retailer: {
        status: "/api/retailer/status",
        token: "/api/retailer/token",
        search: "/api/retailer/search?q={term}",
        match: "/api/retailer/match/{recipeId}",
        list: "/api/retailer/list",
        addRecipe: "/api/retailer/list/add/{recipeId}",
        description: "Product search, recipe matching and shopping list sync",
      },
    },
  });
}
