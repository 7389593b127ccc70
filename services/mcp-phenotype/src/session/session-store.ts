import { randomUUID } from "node:crypto";
import type { LRUCache } from "lru-cache";
import { createTTLCache } from "../cache/lru.js";
import { DEFAULT_SESSION_MAX, DEFAULT_SESSION_TTL_MS } from "../constants.js";
import type { PhenotypeSupportEngine } from "../engine/support-engine.js";
import { InteractiveSession } from "./interactive-session.js";

/** Interactive sessions held for remote callers; idle sessions expire. */
export class SessionStore {
  private readonly sessions: LRUCache<string, InteractiveSession>;

  constructor(
    private readonly engine: PhenotypeSupportEngine,
    ttlMs = DEFAULT_SESSION_TTL_MS,
    max = DEFAULT_SESSION_MAX,
  ) {
    this.sessions = createTTLCache<string, InteractiveSession>(ttlMs, max);
  }

  create(): { sessionId: string; session: InteractiveSession } {
    const sessionId = randomUUID();
    const session = new InteractiveSession(this.engine);
    this.sessions.set(sessionId, session);
    return { sessionId, session };
  }

  get(sessionId: string): InteractiveSession | undefined {
    return this.sessions.get(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}
