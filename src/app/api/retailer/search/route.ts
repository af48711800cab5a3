import { NextRequest } from "next/server";
import { z } from "zod";
import { handleError } from "@/lib/errors";
import { validatedResponse } from "@/lib/validate-response";
import { summarizeProduct } from "@/lib/retailer/products";
import { getRetailerContext } from "@/lib/services";
import { ProductSummarySchema, SearchQuerySchema } from "@/types/retailer";

const SearchResponseSchema = z.array(ProductSummarySchema);

export async function GET(request: NextRequest) {
  try {
    const searchParams = request.nextUrl.searchParams;
    const { q, limit } = SearchQuerySchema.parse({
      q: searchParams.get("q") ?? undefined,
      limit: searchParams.get("limit") ?? undefined,
    });

    const { client } = await getRetailerContext();
    const products = await client.searchProducts(q, undefined, limit);

    return validatedResponse(SearchResponseSchema, products.value.map(summarizeProduct));
  } catch (error) {
    return handleError(error);
  }
}
