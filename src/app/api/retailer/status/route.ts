import { NextRequest } from "next/server";
import { handleError } from "@/lib/errors";
import { validatedResponse } from "@/lib/validate-response";
import { isCredentialExpired } from "@/lib/data/credentials";
import { getRetailerContext } from "@/lib/services";
import { RetailerStatusSchema, UserQuerySchema } from "@/types/retailer";

export async function GET(request: NextRequest) {
  try {
    const { userId } = UserQuerySchema.parse({
      userId: request.nextUrl.searchParams.get("userId") ?? undefined,
    });
    const { config, credential, client } = await getRetailerContext(userId);

    return validatedResponse(RetailerStatusSchema, {
      connected: client.isConfigured(),
      expired: credential ? isCredentialExpired(credential) : false,
      storeId: credential?.storeId || config.retailer.storeId,
      source: credential?.source ?? null,
    });
  } catch (error) {
    return handleError(error);
  }
}
