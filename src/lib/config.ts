import { z } from "zod";

export const DEFAULT_STORE_ID = "217";
export const DEFAULT_TIMEOUT_MS = 15_000;

const EnvSchema = z.object({
  DATABASE_URL: z.string().optional(),
  RETAILER_API_BASE: z.string().url().default("https://gw.meijer.com"),
  RETAILER_SEARCH_URL: z
    .string()
    .url()
    .default("https://www.meijer.com/shopping/search.html"),
  RETAILER_SEARCH_PATH: z.string().startsWith("/").default("/product/api/v1/search"),
  RETAILER_LIST_PATH: z
    .string()
    .startsWith("/")
    .default("/loyalty/shoppinglist/GetList"),
  RETAILER_LIST_ADD_PATH: z
    .string()
    .startsWith("/")
    .default("/loyalty/shoppinglist/AddListItem"),
  RETAILER_STORE_ID: z.string().min(1).default(DEFAULT_STORE_ID),
  RETAILER_AUTH_TOKEN: z.string().default(""),
  RETAILER_REFRESH_TOKEN: z.string().default(""),
  RETAILER_USER_AGENT: z.string().min(1).default("Meijer/8.71.0 (Android)"),
  RETAILER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  RETAILER_TOKEN_TTL_HOURS: z.coerce.number().positive().default(24),
  DEFAULT_USER_ID: z.coerce.number().int().positive().default(1),
});

export interface RetailerConfig {
  apiBase: string;
  storefrontSearchUrl: string;
  paths: {
    search: string;
    listRead: string;
    listAdd: string;
  };
  storeId: string;
  authToken: string;
  refreshToken: string;
  userAgent: string;
  timeoutMs: number;
  tokenTtlHours: number;
}

export interface AppConfig {
  databaseUrl: string | null;
  defaultUserId: number;
  retailer: RetailerConfig;
}

/**
 * Build the application config from environment variables.
 * Throws a ZodError on malformed values.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Treat blank entries in .env files as unset so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.parse(present);

  return {
    databaseUrl: parsed.DATABASE_URL ?? null,
    defaultUserId: parsed.DEFAULT_USER_ID,
    retailer: {
      apiBase: parsed.RETAILER_API_BASE.replace(/\/+$/, ""),
      storefrontSearchUrl: parsed.RETAILER_SEARCH_URL,
      paths: {
        search: parsed.RETAILER_SEARCH_PATH,
        listRead: parsed.RETAILER_LIST_PATH,
        listAdd: parsed.RETAILER_LIST_ADD_PATH,
      },
      storeId: parsed.RETAILER_STORE_ID,
      authToken: parsed.RETAILER_AUTH_TOKEN,
      refreshToken: parsed.RETAILER_REFRESH_TOKEN,
      userAgent: parsed.RETAILER_USER_AGENT,
      timeoutMs: parsed.RETAILER_TIMEOUT_MS,
      tokenTtlHours: parsed.RETAILER_TOKEN_TTL_HOURS,
    },
  };
}

let cached: AppConfig | undefined;

/**
 * Process-wide config, parsed on first use.
 */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
