import { NextRequest } from "next/server";
import { handleError } from "@/lib/errors";
import { validatedResponse } from "@/lib/validate-response";
import { getRetailerContext } from "@/lib/services";
import { ShoppingListSchema, UserQuerySchema } from "@/types/retailer";

export async function GET(request: NextRequest) {
  try {
    const { userId } = UserQuerySchema.parse({
      userId: request.nextUrl.searchParams.get("userId") ?? undefined,
    });
    const { client } = await getRetailerContext(userId);
    const list = await client.getShoppingList();

    return validatedResponse(ShoppingListSchema, { items: list.value });
  } catch (error) {
    return handleError(error);
  }
}
