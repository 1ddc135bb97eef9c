import type { SandboxLease } from "./sandbox-lease.js";
import type { TestRunResult } from "../execution/test-report.js";

export type ExecutionMode = "script" | "test";

export type SessionState = "running" | "completed";

export interface Session {
  id: string;
  lease: SandboxLease;
  createdAt: number;
  mode: ExecutionMode;
  state: SessionState;
  result?: TestRunResult;
}

export type NewSession = Omit<Session, "state"> & { state?: SessionState };

/**
 * In-memory session table. Every method runs to completion without yielding,
 * so concurrent request handlers and the sweeper never observe a
 * half-applied mutation.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  create(session: NewSession): Session {
    if (this.sessions.has(session.id)) {
      throw new Error(`Session ${session.id} already exists`);
    }
    const record: Session = { ...session, state: session.state ?? "running" };
    this.sessions.set(record.id, record);
    return { ...record };
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    return session ? { ...session } : undefined;
  }

  /** Removes the session if present; a second delete returns undefined. */
  delete(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    this.sessions.delete(id);
    return session;
  }

  markCompleted(id: string): void {
    const session = this.sessions.get(id);
    if (session) {
      session.state = "completed";
    }
  }

  /** Point-in-time copy, oldest first. */
  listAll(): Session[] {
    return [...this.sessions.values()]
      .map((session) => ({ ...session }))
      .sort((a, b) => a.createdAt - b.createdAt);
  }
}
