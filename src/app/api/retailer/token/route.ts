import { NextRequest, NextResponse } from "next/server";
import { handleError } from "@/lib/errors";
import { tokenExpiry } from "@/lib/data/credentials";
import { getCredentialContext } from "@/lib/services";
import { SaveTokenQuerySchema } from "@/types/retailer";

/**
 * Store a bearer token captured out of band (e.g. from the retailer's
 * mobile app). Expiry is stamped locally; the retailer does not report it.
 */
export async function POST(request: NextRequest) {
  try {
    const searchParams = request.nextUrl.searchParams;
    const params = SaveTokenQuerySchema.parse({
      userId: searchParams.get("userId") ?? undefined,
      authToken: searchParams.get("authToken") ?? undefined,
      refreshToken: searchParams.get("refreshToken") ?? undefined,
    });

    const { config, userId, credentials } = getCredentialContext(params.userId);

    await credentials.saveCredential({
      userId,
      accessToken: params.authToken,
      refreshToken: params.refreshToken,
      expiresAt: tokenExpiry(config.retailer),
    });

    console.info("[retailer] Token saved", { userId });
    return NextResponse.json({ status: "ok", message: "Retailer token saved" });
  } catch (error) {
    return handleError(error);
  }
}
