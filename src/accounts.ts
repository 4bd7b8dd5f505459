/**
 * Resolves a locally-issued credential to the profile it may join as.
 *
 * Two backends share the {@link AccountResolver} interface and one of them is
 * chosen at startup:
 *
 * - a static table read once from a JSON file of `credential -> profile`
 *   pairs:
 *
 *   ```json
 *   {
 *     "local-token-1": "0f6c5b2e8a3d4c1b9e7f2a6d5c4b3a21"
 *   }
 *   ```
 *
 * - a remote lookup service queried per call with
 *   `GET <endpoint>?token=<credential>`, answering `{ "username": "..." }`.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage } from "./errors";

export interface AccountResolver {
  resolve(credential: string): Promise<string | null>;
}

const accountTableSchema = z.record(z.string(), z.string());

const lookupResponseSchema = z.object({ username: z.string() });

export function createStaticAccountResolver(table: Record<string, string>): AccountResolver {
  const accounts = new Map(Object.entries(table));
  return {
    async resolve(credential: string): Promise<string | null> {
      return accounts.get(credential) ?? null;
    },
  };
}

/**
 * Read the static account table. Unlike the session document, a missing or
 * malformed account file is fatal.
 */
export function loadAccountTable(accountsPath: string): Record<string, string> {
  const content = readFileSync(accountsPath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Account file ${accountsPath} is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = accountTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Account file ${accountsPath} must map credentials to profile strings`);
  }
  return parsed.data;
}

export interface ApiAccountConfig {
  endpoint: string;
  /** Sent as a bearer token when set. */
  secret?: string;
  timeoutMs: number;
}

/**
 * Every failure (transport error, non-2xx status, unexpected body) resolves
 * to `null`; callers only ever see "not found".
 */
export function createApiAccountResolver(apiConfig: ApiAccountConfig): AccountResolver {
  return {
    async resolve(credential: string): Promise<string | null> {
      const url = new URL(apiConfig.endpoint);
      url.searchParams.set("token", credential);

      const headers: Record<string, string> = { Accept: "application/json" };
      if (apiConfig.secret) {
        headers.Authorization = `Bearer ${apiConfig.secret}`;
      }

      try {
        const res = await fetch(url, {
          headers,
          signal: AbortSignal.timeout(apiConfig.timeoutMs),
        });
        if (!res.ok) {
          return null;
        }
        const parsed = lookupResponseSchema.safeParse(await res.json());
        return parsed.success ? parsed.data.username : null;
      } catch (err) {
        console.warn("[session-proxy] account lookup failed:", errorMessage(err));
        return null;
      }
    },
  };
}
