/**
 * Unit tests for src/sessionStore.ts – join bookkeeping and persistence.
 */
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SessionStore, loadSessions } from "../src/sessionStore";

// ── Helpers ────────────────────────────────────────────────────────────────

const T0 = 1_760_000_000;

function tempSessionsPath(): string {
  return join(mkdtempSync(join(tmpdir(), "session-proxy-store-")), "sessions.json");
}

function readDocument(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

// ── Tests ──────────────────────────────────────────────────────────────────

describe("SessionStore", () => {
  let path: string;
  let store: SessionStore;

  beforeEach(() => {
    path = tempSessionsPath();
    store = SessionStore.open(path);
  });

  it("finds a join recorded within the window", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await expect(store.checkJoin("alice", "server-1", T0)).resolves.toBe("uuid-alice");
    await expect(store.checkJoin("alice", "server-1", T0 + 60)).resolves.toBe("uuid-alice");
  });

  it("stops finding a join once it is older than 60 seconds", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await expect(store.checkJoin("alice", "server-1", T0 + 61)).resolves.toBeNull();
  });

  it("matches usernames case-insensitively", async () => {
    await store.recordJoin("Alice", "uuid-alice", "server-1", T0);
    await expect(store.checkJoin("alice", "server-1", T0)).resolves.toBe("uuid-alice");
    await expect(store.checkJoin("ALICE", "server-1", T0)).resolves.toBe("uuid-alice");
  });

  it("misses for an unknown user or another server token", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await expect(store.checkJoin("bob", "server-1", T0)).resolves.toBeNull();
    await expect(store.checkJoin("alice", "server-2", T0)).resolves.toBeNull();
  });

  it("keeps the profile a session was created with", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await store.recordJoin("alice", "uuid-other", "server-2", T0 + 1);
    await expect(store.checkJoin("alice", "server-2", T0 + 1)).resolves.toBe("uuid-alice");
  });

  it("overwrites the timestamp when the same server is joined again", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await store.recordJoin("alice", "uuid-alice", "server-1", T0 + 50);
    await expect(store.checkJoin("alice", "server-1", T0 + 100)).resolves.toBe("uuid-alice");
  });

  it("persists the whole table on every join", async () => {
    await store.recordJoin("Alice", "uuid-alice", "server-1", T0);
    await store.recordJoin("bob", "uuid-bob", "server-2", T0 + 5);
    expect(readDocument(path)).toEqual({
      alice: { profileId: "uuid-alice", servers: { "server-1": T0 } },
      bob: { profileId: "uuid-bob", servers: { "server-2": T0 + 5 } },
    });
  });

  it("prunes expired entries across all sessions on the next join", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await store.recordJoin("alice", "uuid-alice", "server-2", T0 + 30);
    await store.recordJoin("bob", "uuid-bob", "server-3", T0 + 61);

    expect(readDocument(path)).toEqual({
      alice: { profileId: "uuid-alice", servers: { "server-2": T0 + 30 } },
      bob: { profileId: "uuid-bob", servers: { "server-3": T0 + 61 } },
    });
    await expect(store.checkJoin("alice", "server-1", T0 + 61)).resolves.toBeNull();
  });

  it("keeps an entry exactly 60 seconds old when pruning", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    await store.recordJoin("bob", "uuid-bob", "server-2", T0 + 60);
    expect(readDocument(path)).toEqual({
      alice: { profileId: "uuid-alice", servers: { "server-1": T0 } },
      bob: { profileId: "uuid-bob", servers: { "server-2": T0 + 60 } },
    });
  });

  it("does not write anything on a check", async () => {
    await store.checkJoin("alice", "server-1", T0);
    expect(() => readFileSync(path, "utf-8")).toThrow();
  });

  it("keeps concurrent joins for different users intact", async () => {
    await Promise.all([
      store.recordJoin("alice", "uuid-alice", "server-1", T0),
      store.recordJoin("bob", "uuid-bob", "server-2", T0),
      store.recordJoin("carol", "uuid-carol", "server-3", T0),
    ]);
    expect(readDocument(path)).toEqual({
      alice: { profileId: "uuid-alice", servers: { "server-1": T0 } },
      bob: { profileId: "uuid-bob", servers: { "server-2": T0 } },
      carol: { profileId: "uuid-carol", servers: { "server-3": T0 } },
    });
  });

  it("leaves the table untouched when the write fails", async () => {
    const unwritable = SessionStore.open(join(tempSessionsPath(), "missing-dir", "sessions.json"));
    await expect(unwritable.recordJoin("alice", "uuid-alice", "server-1", T0)).rejects.toThrow();
    await expect(unwritable.checkJoin("alice", "server-1", T0)).resolves.toBeNull();
  });

  it("keeps the previous table when a later write fails", async () => {
    const dir = mkdtempSync(join(tmpdir(), "session-proxy-store-"));
    const sessionsPath = join(dir, "sessions.json");
    const failing = SessionStore.open(sessionsPath);
    await failing.recordJoin("alice", "uuid-alice", "server-1", T0);

    // A directory in the way of the temporary file makes the next write fail.
    mkdirSync(`${sessionsPath}.tmp`);
    await expect(failing.recordJoin("bob", "uuid-bob", "server-2", T0 + 30)).rejects.toThrow();

    await expect(failing.checkJoin("alice", "server-1", T0 + 30)).resolves.toBe("uuid-alice");
    await expect(failing.checkJoin("bob", "server-2", T0 + 30)).resolves.toBeNull();
    expect(readDocument(sessionsPath)).toEqual({
      alice: { profileId: "uuid-alice", servers: { "server-1": T0 } },
    });
  });

  it("replaces the file without leaving a temporary copy", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it("restores persisted sessions when reopened", async () => {
    await store.recordJoin("alice", "uuid-alice", "server-1", T0);
    const reopened = SessionStore.open(path);
    await expect(reopened.checkJoin("Alice", "server-1", T0 + 10)).resolves.toBe("uuid-alice");
  });
});

describe("loadSessions", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("returns an empty table when the file does not exist", () => {
    expect(loadSessions(tempSessionsPath()).size).toBe(0);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("returns an empty table when the file contains invalid JSON", () => {
    const path = tempSessionsPath();
    writeFileSync(path, "NOT_JSON{{{");
    expect(loadSessions(path).size).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("returns an empty table when the document has the wrong shape", () => {
    const path = tempSessionsPath();
    writeFileSync(path, JSON.stringify({ alice: { uuid: "uuid-alice" } }));
    expect(loadSessions(path).size).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("restores profiles and server timestamps", () => {
    const path = tempSessionsPath();
    writeFileSync(
      path,
      JSON.stringify({ alice: { profileId: "uuid-alice", servers: { "server-1": T0 } } })
    );
    const sessions = loadSessions(path);
    expect(sessions.get("alice")?.profileId).toBe("uuid-alice");
    expect(sessions.get("alice")?.servers.get("server-1")).toBe(T0);
  });

  it("lower-cases usernames from the file", () => {
    const path = tempSessionsPath();
    writeFileSync(
      path,
      JSON.stringify({ Alice: { profileId: "uuid-alice", servers: { "server-1": T0 } } })
    );
    const sessions = loadSessions(path);
    expect([...sessions.keys()]).toEqual(["alice"]);
  });
});
