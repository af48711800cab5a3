import type { RetailerConfig } from "@/lib/config";
import { db, type Queryable } from "@/lib/db";
import type { Credential, RetailerTokenRow } from "@/types/retailer";

export interface SaveCredentialInput {
  userId: number;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}

export interface CredentialStore {
  getCredential(userId: number): Promise<Credential | null>;
  saveCredential(input: SaveCredentialInput): Promise<Credential>;
}

export function rowToCredential(row: RetailerTokenRow): Credential {
  return {
    userId: row.user_id,
    accessToken: row.access_token,
    refreshToken: row.refresh_token || null,
    storeId: row.store_id,
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
    source: "stored",
  };
}

export function createCredentialStore(client: Queryable = db): CredentialStore {
  return {
    async getCredential(userId) {
      const result = await client.query<RetailerTokenRow>(
        `SELECT user_id, access_token, refresh_token, store_id, expires_at, updated_at
         FROM retailer_tokens
         WHERE user_id = $1`,
        [userId]
      );
      return result.rows.length > 0 ? rowToCredential(result.rows[0]) : null;
    },

    async saveCredential({ userId, accessToken, refreshToken, expiresAt }) {
      const result = await client.query<RetailerTokenRow>(
        `INSERT INTO retailer_tokens (user_id, access_token, refresh_token, expires_at, updated_at)
         VALUES ($1, $2, $3, $4, NOW())
         ON CONFLICT (user_id) DO UPDATE
         SET access_token = EXCLUDED.access_token,
             refresh_token = EXCLUDED.refresh_token,
             expires_at = EXCLUDED.expires_at,
             updated_at = NOW()
         RETURNING user_id, access_token, refresh_token, store_id, expires_at, updated_at`,
        [userId, accessToken, refreshToken, expiresAt]
      );
      if (result.rows.length === 0) {
        throw new Error(`Failed to save retailer token for user ${userId}`);
      }
      return rowToCredential(result.rows[0]);
    },
  };
}

/**
 * Detection only; an expired token is reported, never renewed.
 */
export function isCredentialExpired(credential: Credential, now: Date = new Date()): boolean {
  return credential.expiresAt !== null && now.getTime() > credential.expiresAt.getTime();
}

/**
 * The user's stored credential, else one built from the configured token,
 * else null.
 */
export async function resolveCredential(
  store: CredentialStore,
  userId: number,
  config: RetailerConfig
): Promise<Credential | null> {
  const stored = await store.getCredential(userId);
  if (stored) return stored;

  if (!config.authToken) return null;

  return {
    userId,
    accessToken: config.authToken,
    refreshToken: config.refreshToken || null,
    storeId: null,
    expiresAt: null,
    source: "env",
  };
}

export function tokenExpiry(config: RetailerConfig, now: Date = new Date()): Date {
  return new Date(now.getTime() + config.tokenTtlHours * 60 * 60 * 1000);
}
