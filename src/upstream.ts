/**
 * Reaches the real session authority from behind a DNS override.
 *
 * Clients are pointed at this proxy by overriding the authority's hostname in
 * DNS, so the system resolver would hand back our own address. The connector
 * therefore:
 *
 *   1. Resolves the authority's A record through a fixed set of trusted
 *      nameservers, never the system resolver.
 *   2. Connects over TLS to that IP, sending the real hostname as SNI and as
 *      the `Host` header.
 *   3. Skips certificate verification, since the peer is addressed by IP.
 *
 * This exception applies only to the one configured authority host.
 */
import { Resolver } from "node:dns/promises";
import { request as httpsRequest } from "node:https";
import { UpstreamUnavailableError, errorMessage } from "./errors";

export interface UpstreamResponse {
  status: number;
  contentType?: string;
  body: Buffer;
}

export interface UpstreamConnector {
  resolveUpstreamAddress(): Promise<string>;
  request(method: "GET" | "POST", pathAndQuery: string, body?: Buffer): Promise<UpstreamResponse>;
}

/** Returns the IPv4 addresses on record for a hostname. */
export type Resolve4Fn = (hostname: string) => Promise<string[]>;

export interface UpstreamOptions {
  /** Canonical authority hostname, used for DNS, SNI and `Host`. */
  hostname: string;
  /** Trusted resolvers queried instead of the system resolver. */
  nameservers: string[];
  timeoutMs: number;
  /** Defaults to 443. */
  port?: number;
  /**
   * Override for the trusted A-record lookup. Defaults to a `Resolver`
   * bound to `nameservers`. Override in tests.
   */
  resolve4?: Resolve4Fn;
}

function createTrustedResolve4(nameservers: string[], timeoutMs: number): Resolve4Fn {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 2 });
  resolver.setServers(nameservers);
  return (hostname: string) => resolver.resolve4(hostname);
}

export function createUpstreamConnector(options: UpstreamOptions): UpstreamConnector {
  const port = options.port ?? 443;
  const resolve4 =
    options.resolve4 ?? createTrustedResolve4(options.nameservers, options.timeoutMs);

  async function resolveUpstreamAddress(): Promise<string> {
    let addresses: string[];
    try {
      addresses = await resolve4(options.hostname);
    } catch (err) {
      throw new UpstreamUnavailableError(
        `Could not resolve ${options.hostname}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
    if (addresses.length === 0) {
      throw new UpstreamUnavailableError(`No address on record for ${options.hostname}`);
    }
    return addresses[0];
  }

  function send(
    address: string,
    method: "GET" | "POST",
    pathAndQuery: string,
    body?: Buffer
  ): Promise<UpstreamResponse> {
    return new Promise((resolve, reject) => {
      const headers: Record<string, string | number> = {
        Host: options.hostname,
        Accept: "application/json",
      };
      if (body) {
        headers["Content-Type"] = "application/json";
        headers["Content-Length"] = body.length;
      }

      const req = httpsRequest(
        {
          host: address,
          port,
          method,
          path: pathAndQuery,
          headers,
          servername: options.hostname,
          rejectUnauthorized: false,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("end", () => {
            clearTimeout(deadline);
            const contentType = res.headers["content-type"];
            resolve({
              status: res.statusCode ?? 502,
              contentType,
              body: Buffer.concat(chunks),
            });
          });
          res.on("error", (err) => {
            clearTimeout(deadline);
            reject(new UpstreamUnavailableError(`Upstream response failed: ${err.message}`, { cause: err }));
          });
        }
      );

      // Bounds the whole exchange, not just idle time on the socket.
      const deadline = setTimeout(() => {
        const err = new Error(`timed out after ${options.timeoutMs} ms`);
        reject(new UpstreamUnavailableError(`Upstream request failed: ${err.message}`, { cause: err }));
        req.destroy(err);
      }, options.timeoutMs);
      req.on("error", (err) => {
        clearTimeout(deadline);
        reject(new UpstreamUnavailableError(`Upstream request failed: ${err.message}`, { cause: err }));
      });
      req.end(body);
    });
  }

  return {
    resolveUpstreamAddress,
    async request(method, pathAndQuery, body) {
      const address = await resolveUpstreamAddress();
      return send(address, method, pathAndQuery, body);
    },
  };
}
