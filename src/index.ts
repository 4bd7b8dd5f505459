/**
 * Entry point – wires together config, account backend, session store,
 * upstream connector, and the HTTP server.
 */
import dotenv from "dotenv";
import {
  createApiAccountResolver,
  createStaticAccountResolver,
  loadAccountTable,
  type AccountResolver,
} from "./accounts";
import { loadConfig } from "./config";
import { createHandshakeService } from "./handshake";
import { createProxyServer } from "./server";
import { SessionStore } from "./sessionStore";
import { createUpstreamConnector } from "./upstream";

dotenv.config();

const config = loadConfig(process.env);

const accounts: AccountResolver =
  config.accounts.kind === "api"
    ? createApiAccountResolver({
        endpoint: config.accounts.endpoint,
        secret: config.accounts.secret,
        timeoutMs: config.upstreamTimeoutMs,
      })
    : createStaticAccountResolver(loadAccountTable(config.accounts.accountsPath));

const handshake = createHandshakeService({
  accounts,
  upstream: createUpstreamConnector({
    hostname: config.upstreamHost,
    nameservers: config.upstreamNameservers,
    timeoutMs: config.upstreamTimeoutMs,
  }),
  sessions: SessionStore.open(config.sessionsPath),
});

const server = createProxyServer({ handshake });

server.on("error", (err) => {
  console.error(`[session-proxy] cannot listen on ${config.host}:${config.port}:`, err.message);
  process.exit(1);
});

server.listen(config.port, config.host, () => {
  console.log(`[session-proxy] listening on ${config.host}:${config.port}`);
  console.log(
    `[session-proxy] accounts: ${
      config.accounts.kind === "api" ? config.accounts.endpoint : config.accounts.accountsPath
    }`
  );
  console.log(`[session-proxy] sessions: ${config.sessionsPath}`);
  console.log(`[session-proxy] upstream: ${config.upstreamHost} via ${config.upstreamNameservers.join(", ")}`);
});
