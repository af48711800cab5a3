import { z } from "zod";
import { NextResponse } from "next/server";

/**
 * Serialize a payload after checking it against its response schema.
 *
 * A mismatch is logged. Development builds throw so the bug surfaces at
 * once; production returns the unvalidated payload.
 */
export function validatedResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  options?: { status?: number }
): NextResponse<z.infer<T>> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    console.error("[Response Validation Failed]", {
      issues,
      data: JSON.stringify(data).slice(0, 1000),
    });

    if (process.env.NODE_ENV === "development") {
      throw new Error(`Response validation failed: ${JSON.stringify(issues)}`);
    }
  }

  // Unvalidated data is passed through as-is in production
  const payload = (result.success ? result.data : data) as z.infer<T>;

  return NextResponse.json(payload, { status: options?.status ?? 200 });
}
