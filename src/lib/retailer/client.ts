/**
 * Retailer catalog and shopping-list client.
 *
 * Every read path degrades to an empty value instead of throwing: a failed
 * search for one ingredient must not stop matching for the rest of a
 * recipe. The failure is still reported on the returned outcome and in the
 * logs. List additions go one item at a time and collect per-item errors.
 *
 * Tokens are only read here. An expired token shows up as AUTH_EXPIRED;
 * nothing in this module refreshes it.
 */

import type { RetailerConfig } from "@/lib/config";
import {
  RawProductSchema,
  SearchResponseSchema,
  ShoppingListResponseSchema,
  type AddToListResult,
  type Credential,
  type ListItem,
  type RawListItem,
  type RawProduct,
} from "@/types/retailer";
import { toMatchedProduct, type MatchedProduct } from "./products";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RetailerFailure = "NOT_CONFIGURED" | "AUTH_EXPIRED" | "TRANSPORT_FAILURE";

/**
 * Result of a read against the retailer. `value` is always usable: on
 * failure it holds the degraded (empty) result.
 */
export type RetailerOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: RetailerFailure; detail: string; value: T };

export type FetchFn = typeof fetch;

export interface RetailerClientOptions {
  config: RetailerConfig;
  /** Overrides the token from config. `null` means no stored credential. */
  credential?: Pick<Credential, "accessToken" | "storeId"> | null;
  fetch?: FetchFn;
}

export const SEARCH_LIMIT_MIN = 1;
export const SEARCH_LIMIT_MAX = 50;
export const DEFAULT_SEARCH_LIMIT = 5;

const ADDED_STATUSES = new Set([200, 201, 204]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function degrade<T>(failure: RetailerFailure, detail: string, value: T): RetailerOutcome<T> {
  return { ok: false, failure, detail, value };
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "request timed out" : err.message;
  }
  return String(err);
}

export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.min(SEARCH_LIMIT_MAX, Math.max(SEARCH_LIMIT_MIN, Math.trunc(limit)));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class RetailerClient {
  private readonly config: RetailerConfig;
  private readonly accessToken: string;
  private readonly storeId: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: RetailerClientOptions) {
    this.config = options.config;
    this.accessToken =
      options.credential === undefined
        ? options.config.authToken
        : (options.credential?.accessToken ?? "");
    this.storeId = options.credential?.storeId || options.config.storeId;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  isConfigured(): boolean {
    return this.accessToken.length > 0;
  }

  get defaultStoreId(): string {
    return this.storeId;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      Accept: "application/json",
      "Content-Type": "application/json",
      "User-Agent": this.config.userAgent,
    };
  }

  private url(path: string, params?: Record<string, string>): string {
    const query = params ? `?${new URLSearchParams(params).toString()}` : "";
    return `${this.config.apiBase}${path}${query}`;
  }

  /**
   * GET a JSON document. Never throws.
   */
  private async getJson(
    operation: string,
    url: string
  ): Promise<RetailerOutcome<unknown>> {
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: this.headers(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        // Release the connection for reuse
        await response.body?.cancel();
      }

      if (response.status === 401) {
        console.error("[retailer] Auth token expired, needs refresh", { operation });
        return degrade("AUTH_EXPIRED", "HTTP 401", null);
      }

      if (!response.ok) {
        console.error("[retailer] Request failed", { operation, status: response.status });
        return degrade("TRANSPORT_FAILURE", `HTTP ${response.status}`, null);
      }

      return { ok: true, value: await response.json() };
    } catch (err) {
      const detail = describeError(err);
      console.error("[retailer] Request failed", { operation, error: detail });
      return degrade("TRANSPORT_FAILURE", detail, null);
    }
  }

  // -------------------------------------------------------------------------
  // Product search
  // -------------------------------------------------------------------------

  async searchProducts(
    term: string,
    storeId?: string,
    limit: number = DEFAULT_SEARCH_LIMIT
  ): Promise<RetailerOutcome<RawProduct[]>> {
    if (!this.isConfigured()) {
      console.warn("[retailer] Not configured, skipping product search", { term });
      return degrade("NOT_CONFIGURED", "no access token", []);
    }

    const query = term.trim();
    if (!query) return { ok: true, value: [] };

    const outcome = await this.getJson(
      "search",
      this.url(this.config.paths.search, {
        query,
        storeId: storeId || this.storeId,
        offset: "0",
        limit: String(clampLimit(limit)),
      })
    );
    if (!outcome.ok) return { ...outcome, value: [] };

    const body = SearchResponseSchema.safeParse(outcome.value);
    if (!body.success) {
      console.error("[retailer] Unexpected search payload", { term: query });
      return degrade("TRANSPORT_FAILURE", "malformed search response", []);
    }

    const products: RawProduct[] = [];
    let rejected = 0;
    for (const item of body.data.products ?? []) {
      const parsed = RawProductSchema.safeParse(item);
      if (parsed.success) {
        products.push(parsed.data);
      } else {
        rejected++;
      }
    }
    if (rejected > 0) {
      console.warn("[retailer] Dropped malformed products", { term: query, rejected });
    }

    return { ok: true, value: products };
  }

  /**
   * Top search hit for an ingredient, mapped to product fields.
   * `value` is null when nothing was found or the search failed.
   */
  async searchBestMatch(
    ingredientName: string,
    storeId?: string
  ): Promise<RetailerOutcome<MatchedProduct | null>> {
    const outcome = await this.searchProducts(ingredientName, storeId, 1);
    const top = outcome.value[0];
    const value = top
      ? toMatchedProduct(top, ingredientName, this.config.storefrontSearchUrl)
      : null;

    return outcome.ok ? { ok: true, value } : { ...outcome, value };
  }

  // -------------------------------------------------------------------------
  // Shopping list
  // -------------------------------------------------------------------------

  async getShoppingList(): Promise<RetailerOutcome<RawListItem[]>> {
    if (!this.isConfigured()) {
      return degrade("NOT_CONFIGURED", "no access token", []);
    }

    const outcome = await this.getJson("list", this.url(this.config.paths.listRead));
    if (!outcome.ok) return { ...outcome, value: [] };

    const body = ShoppingListResponseSchema.safeParse(outcome.value);
    if (!body.success) {
      console.error("[retailer] Unexpected shopping list payload");
      return degrade("TRANSPORT_FAILURE", "malformed shopping list response", []);
    }

    return { ok: true, value: body.data.items ?? [] };
  }

  /**
   * Add items one request at a time. A failed item is recorded and the loop
   * moves on; success means at least one item landed.
   */
  async addToShoppingList(items: ListItem[]): Promise<AddToListResult> {
    if (!this.isConfigured()) {
      return {
        success: false,
        added: 0,
        total: items.length,
        errors: [],
        error: "not configured",
      };
    }

    let added = 0;
    const errors: string[] = [];

    for (const item of items) {
      try {
        const response = await this.fetchImpl(this.url(this.config.paths.listAdd), {
          method: "POST",
          headers: this.headers(),
          body: JSON.stringify({ itemName: item.name, quantity: item.quantity }),
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
        // Drain so the next POST reuses the socket
        await response.text();

        if (ADDED_STATUSES.has(response.status)) {
          added++;
        } else {
          if (response.status === 401) {
            console.error("[retailer] Auth token expired, needs refresh", {
              operation: "list-add",
            });
          }
          errors.push(`${item.name}: ${response.status}`);
        }
      } catch (err) {
        errors.push(`${item.name}: ${describeError(err)}`);
      }
    }

    console.info(`[retailer] Added ${added}/${items.length} items to shopping list`, {
      failed: errors.length,
    });

    return {
      success: added > 0,
      added,
      total: items.length,
      errors,
    };
  }
}
