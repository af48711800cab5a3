import { getConfig, type AppConfig } from "@/lib/config";
import {
  createCredentialStore,
  resolveCredential,
  type CredentialStore,
} from "@/lib/data/credentials";
import { createRecipeStore, type RecipeStore } from "@/lib/data/recipes";
import { RetailerClient, type FetchFn } from "@/lib/retailer/client";
import { SyncOrchestrator } from "@/lib/sync";
import type { Credential } from "@/types/retailer";

export interface RetailerContext {
  config: AppConfig;
  userId: number;
  credential: Credential | null;
  client: RetailerClient;
  orchestrator: SyncOrchestrator;
}

export interface RetailerContextOptions {
  config?: AppConfig;
  credentials?: CredentialStore;
  recipes?: RecipeStore;
  fetch?: FetchFn;
}

export interface CredentialContext {
  config: AppConfig;
  userId: number;
  credentials: CredentialStore;
}

/**
 * Config and credential store for routes that write tokens.
 */
export function getCredentialContext(
  userId?: number,
  options: RetailerContextOptions = {}
): CredentialContext {
  const config = options.config ?? getConfig();
  return {
    config,
    userId: userId ?? config.defaultUserId,
    credentials: options.credentials ?? createCredentialStore(),
  };
}

/**
 * Build a request-scoped client and orchestrator for one user.
 * Each request gets its own client; no credential state is shared.
 */
export async function getRetailerContext(
  userId?: number,
  options: RetailerContextOptions = {}
): Promise<RetailerContext> {
  const config = options.config ?? getConfig();
  const uid = userId ?? config.defaultUserId;
  const credentials = options.credentials ?? createCredentialStore();
  const credential = await resolveCredential(credentials, uid, config.retailer);

  const client = new RetailerClient({
    config: config.retailer,
    credential,
    fetch: options.fetch,
  });

  const orchestrator = new SyncOrchestrator({
    recipes: options.recipes ?? createRecipeStore(),
    client,
  });

  return { config, userId: uid, credential, client, orchestrator };
}
