/**
 * HTTP front of the session proxy.
 *
 * Routes accepted by this server:
 *
 *   POST /session/minecraft/join        { selectedProfile, serverId, authString? }
 *   GET  /session/minecraft/hasJoined   ?username=&serverId=[&ip=]
 *   GET  /health                        JSON liveness probe
 *
 * Upstream failures surface as 503; malformed requests as 400.
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { z } from "zod";
import { UpstreamUnavailableError, errorMessage } from "./errors";
import { SESSION_API_PREFIX, type HandshakeResult, type HandshakeService } from "./handshake";

export interface ServerDeps {
  handshake: HandshakeService;
  /** Largest accepted request body, in bytes. Defaults to 64 KiB. */
  maxBodyBytes?: number;
}

const joinBodySchema = z.object({
  selectedProfile: z.string(),
  serverId: z.string(),
  authString: z.string().nullish(),
});

class RequestError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = "RequestError";
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        // Stop reading; the 413 closes the connection.
        req.removeAllListeners("data");
        req.pause();
        reject(new RequestError(413, "Request body too large"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

function parseJoinBody(rawBody: Buffer): z.infer<typeof joinBodySchema> {
  let json: unknown;
  try {
    json = JSON.parse(rawBody.toString("utf-8"));
  } catch {
    throw new RequestError(400, "Body must be JSON");
  }
  const parsed = joinBodySchema.safeParse(json);
  if (!parsed.success) {
    throw new RequestError(400, "selectedProfile and serverId are required");
  }
  return parsed.data;
}

function sendJson(
  res: ServerResponse,
  statusCode: number,
  payload: unknown,
  headers: Record<string, string> = {}
): void {
  res.writeHead(statusCode, { "Content-Type": "application/json", ...headers });
  res.end(JSON.stringify(payload));
}

function sendResult(res: ServerResponse, result: HandshakeResult): void {
  const headers: Record<string, string> = {};
  if (result.contentType) {
    headers["Content-Type"] = result.contentType;
  }
  res.writeHead(result.status, headers);
  if (result.status === 204 || result.status === 304) {
    res.end();
    return;
  }
  res.end(result.body ?? "");
}

/**
 * Create and return the HTTP server (not yet listening).
 * Call `server.listen(port, host)` to start it.
 */
export function createProxyServer(deps: ServerDeps): Server {
  const maxBodyBytes = deps.maxBodyBytes ?? 64 * 1024;

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === "/health") {
      sendJson(res, 200, { status: "ok", service: "session-proxy" });
      return;
    }

    if (url.pathname === `${SESSION_API_PREFIX}/join`) {
      if (req.method !== "POST") {
        res.writeHead(405, { Allow: "POST" });
        res.end();
        return;
      }
      const rawBody = await readBody(req, maxBodyBytes);
      const body = parseJoinBody(rawBody);
      sendResult(
        res,
        await deps.handshake.join({
          selectedProfile: body.selectedProfile,
          serverId: body.serverId,
          authString: body.authString ?? undefined,
          rawBody,
        })
      );
      return;
    }

    if (url.pathname === `${SESSION_API_PREFIX}/hasJoined`) {
      if (req.method !== "GET") {
        res.writeHead(405, { Allow: "GET" });
        res.end();
        return;
      }
      const username = url.searchParams.get("username");
      const serverId = url.searchParams.get("serverId");
      if (!username || !serverId) {
        throw new RequestError(400, "username and serverId are required");
      }
      sendResult(
        res,
        await deps.handshake.hasJoined({
          username,
          serverId,
          ip: url.searchParams.get("ip") ?? undefined,
        })
      );
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not Found");
  }

  return createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        console.error("[session-proxy] failed after response started:", errorMessage(err));
        res.destroy();
        return;
      }
      if (err instanceof RequestError) {
        sendJson(
          res,
          err.statusCode,
          { error: err.message },
          err.statusCode === 413 ? { Connection: "close" } : {}
        );
        return;
      }
      if (err instanceof UpstreamUnavailableError) {
        console.error("[session-proxy] upstream unavailable:", err.message);
        sendJson(res, 503, { error: "Session authority unavailable" });
        return;
      }
      console.error("[session-proxy] request failed:", errorMessage(err));
      sendJson(res, 500, { error: "Internal error" });
    });
  });
}
