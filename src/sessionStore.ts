/**
 * Remembers which profile recently joined which server.
 *
 * Keyed by lower-cased username. Every mutation rewrites the whole table to
 * the sessions file, which has this shape:
 *
 * ```json
 * {
 *   "alice": {
 *     "profileId": "0f6c5b2e8a3d4c1b9e7f2a6d5c4b3a21",
 *     "servers": { "-5b1f0a9c2e": 1760875200 }
 *   }
 * }
 * ```
 */
import { readFileSync, renameSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage } from "./errors";

/** Seconds a recorded join stays valid for a has-joined check. */
export const SESSION_VALIDITY_SECONDS = 60;

export interface Session {
  profileId: string;
  /** Server token -> Unix time (seconds) the join was recorded. */
  servers: Map<string, number>;
}

const sessionsSchema = z.record(
  z.string(),
  z.object({
    profileId: z.string(),
    servers: z.record(z.string(), z.number()),
  })
);

type LockJob<T> = () => T | Promise<T>;

class LockQueue {
  private queue: Promise<void> = Promise.resolve();

  run<T>(job: LockJob<T>): Promise<T> {
    const runNext = this.queue.then(job, job);
    this.queue = runNext.then(
      () => undefined,
      () => undefined
    );
    return runNext;
  }
}

/**
 * Read a persisted sessions file. An absent or malformed file yields an empty
 * table.
 */
export function loadSessions(sessionsPath: string): Map<string, Session> {
  let content: string;
  try {
    content = readFileSync(sessionsPath, "utf-8");
  } catch {
    // Not written yet
    return new Map();
  }
  try {
    const parsed = sessionsSchema.safeParse(JSON.parse(content));
    if (parsed.success) {
      return new Map(
        Object.entries(parsed.data).map(([username, stored]): [string, Session] => [
          username.toLowerCase(),
          { profileId: stored.profileId, servers: new Map(Object.entries(stored.servers)) },
        ])
      );
    }
    console.warn(`[session-proxy] ignoring malformed sessions file ${sessionsPath}`);
  } catch (err) {
    console.warn(`[session-proxy] ignoring unreadable sessions file ${sessionsPath}:`, errorMessage(err));
  }
  return new Map();
}

export class SessionStore {
  private readonly lock = new LockQueue();

  constructor(
    private readonly sessionsPath: string,
    private sessions: Map<string, Session> = new Map()
  ) {}

  /** Open the store backed by `sessionsPath`, restoring whatever it holds. */
  static open(sessionsPath: string): SessionStore {
    return new SessionStore(sessionsPath, loadSessions(sessionsPath));
  }

  /**
   * Prune expired joins across every session, then record `serverToken` for
   * `username` at `now` and persist the table before resolving. A new session
   * takes `profileId`; an existing one keeps the profile it was created with.
   */
  recordJoin(username: string, profileId: string, serverToken: string, now: number): Promise<void> {
    const key = username.toLowerCase();
    return this.lock.run(() => {
      const next = new Map<string, Session>();
      for (const [name, session] of this.sessions) {
        const servers = new Map<string, number>();
        for (const [token, joinedAt] of session.servers) {
          if (now - joinedAt <= SESSION_VALIDITY_SECONDS) {
            servers.set(token, joinedAt);
          }
        }
        next.set(name, { profileId: session.profileId, servers });
      }

      let session = next.get(key);
      if (!session) {
        session = { profileId, servers: new Map() };
        next.set(key, session);
      }
      session.servers.set(serverToken, now);

      // The table only changes once the new document is on disk.
      this.persist(next);
      this.sessions = next;
    });
  }

  /** The profile that joined `serverToken` as `username` within the window, if any. */
  checkJoin(username: string, serverToken: string, now: number): Promise<string | null> {
    const key = username.toLowerCase();
    return this.lock.run(() => {
      const session = this.sessions.get(key);
      const joinedAt = session?.servers.get(serverToken);
      if (!session || joinedAt === undefined) {
        return null;
      }
      return now - joinedAt <= SESSION_VALIDITY_SECONDS ? session.profileId : null;
    });
  }

  private persist(sessions: Map<string, Session>): void {
    const document: Record<string, { profileId: string; servers: Record<string, number> }> = {};
    for (const [username, session] of sessions) {
      document[username] = {
        profileId: session.profileId,
        servers: Object.fromEntries(session.servers),
      };
    }
    const tmpPath = `${this.sessionsPath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(document, null, 2));
    renameSync(tmpPath, this.sessionsPath);
  }
}
