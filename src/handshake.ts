/**
 * The join / hasJoined handshake, answered on behalf of the session authority.
 *
 * join:
 *   - without `authString` the request is relayed to the authority as-is;
 *   - with `authString` the credential must resolve to `selectedProfile`, the
 *     profile's canonical name is looked up upstream and the join is recorded
 *     locally under that name.
 *
 * hasJoined:
 *   - a join recorded locally within the validity window is answered with the
 *     signed profile fetched from the authority;
 *   - anything else is relayed to the authority's own hasJoined.
 */
import type { AccountResolver } from "./accounts";
import type { SessionStore } from "./sessionStore";
import type { UpstreamConnector, UpstreamResponse } from "./upstream";

export const SESSION_API_PREFIX = "/session/minecraft";

export interface JoinRequest {
  selectedProfile: string;
  serverId: string;
  /** Locally-issued credential. Absent for a plain authority join. */
  authString?: string;
  /** The body exactly as received, relayed on the plain path. */
  rawBody: Buffer;
}

export interface HasJoinedQuery {
  username: string;
  serverId: string;
  /** Client address the server wants checked, relayed when present. */
  ip?: string;
}

export interface HandshakeResult {
  status: number;
  contentType?: string;
  body?: Buffer;
}

export interface HandshakeDeps {
  accounts: AccountResolver;
  upstream: UpstreamConnector;
  sessions: SessionStore;
  /** Current Unix time in seconds. Override in tests. */
  now?: () => number;
}

export interface HandshakeService {
  join(request: JoinRequest): Promise<HandshakeResult>;
  hasJoined(query: HasJoinedQuery): Promise<HandshakeResult>;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

/** Read the `name` field of a profile document, or null if there is none. */
export function parseProfileName(body: Buffer): string | null {
  let profile: unknown;
  try {
    profile = JSON.parse(body.toString("utf-8"));
  } catch {
    return null;
  }
  if (typeof profile !== "object" || profile === null || !("name" in profile)) {
    return null;
  }
  return typeof profile.name === "string" ? profile.name : null;
}

function relay(res: UpstreamResponse): HandshakeResult {
  return { status: res.status, contentType: res.contentType, body: res.body };
}

export function createHandshakeService(deps: HandshakeDeps): HandshakeService {
  const now = deps.now ?? unixNow;

  return {
    async join(request: JoinRequest): Promise<HandshakeResult> {
      const viaCredential = request.authString !== undefined;
      console.log(
        `[session-proxy] ${request.selectedProfile} joining ${request.serverId}` +
          (viaCredential ? " (local account)" : "")
      );

      if (request.authString === undefined) {
        const res = await deps.upstream.request("POST", `${SESSION_API_PREFIX}/join`, request.rawBody);
        return { status: res.status };
      }

      const profile = await deps.accounts.resolve(request.authString);
      if (profile === null || profile !== request.selectedProfile) {
        return { status: 401 };
      }

      const lookup = await deps.upstream.request(
        "GET",
        `${SESSION_API_PREFIX}/profile/${encodeURIComponent(request.selectedProfile)}`
      );
      const name = parseProfileName(lookup.body);
      if (name === null) {
        console.error(
          `[session-proxy] profile lookup for ${request.selectedProfile} returned no name (status ${lookup.status})`
        );
        return { status: 503 };
      }

      await deps.sessions.recordJoin(name, request.selectedProfile, request.serverId, now());
      return { status: 204 };
    },

    async hasJoined(query: HasJoinedQuery): Promise<HandshakeResult> {
      const profileId = await deps.sessions.checkJoin(query.username, query.serverId, now());
      if (profileId !== null) {
        return relay(
          await deps.upstream.request(
            "GET",
            `${SESSION_API_PREFIX}/profile/${encodeURIComponent(profileId)}?unsigned=false`
          )
        );
      }

      const params = new URLSearchParams({
        serverId: query.serverId,
        username: query.username.toLowerCase(),
      });
      if (query.ip) {
        params.set("ip", query.ip);
      }
      return relay(await deps.upstream.request("GET", `${SESSION_API_PREFIX}/hasJoined?${params}`));
    },
  };
}
