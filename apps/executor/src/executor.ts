import {
  isSandboxNotFoundError,
  type SandboxProvider,
} from "@code-exec/sandbox-core";
import type { ExecutorConfig } from "./config.js";
import {
  NotFoundError,
  ReclaimError,
  RetrievalError,
  describeError,
} from "./errors.js";
import {
  ExecutionDispatcher,
  type ScriptDispatch,
  type TestDispatch,
} from "./execution/dispatcher.js";
import { buildIdleSandboxSpec } from "./execution/sandbox-specs.js";
import { ExpirationSweeper } from "./lifecycle/expiration-sweeper.js";
import { WarmPool, type PrewarmOutcome } from "./pool/warm-pool.js";
import { SessionRegistry, type Session } from "./sessions/session-registry.js";
import { CodeStager, type SubmittedFile } from "./staging/code-stager.js";
import { createLogger, LogLevel } from "./utils/logger.js";

const logger = createLogger(LogLevel.INFO, "SandboxExecutor");

export interface SandboxExecutorOptions {
  provider: SandboxProvider;
  config: ExecutorConfig;
  now?: () => number;
  generateId?: () => string;
}

export type PollResult =
  | { state: "running" }
  | { state: "completed"; logs: string };

export interface ExecutorHealth {
  sessions: number;
  pool: { idle: number; target: number };
}

export class SandboxExecutor {
  readonly registry = new SessionRegistry();
  readonly pool: WarmPool;
  readonly sweeper: ExpirationSweeper;
  private readonly provider: SandboxProvider;
  private readonly dispatcher: ExecutionDispatcher;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: SandboxExecutorOptions) {
    const { provider, config } = options;
    this.provider = provider;
    this.pool = new WarmPool(provider, {
      targetSize: config.warmPoolSize,
      idleSandboxSpec: () => buildIdleSandboxSpec(config.sandbox),
    });
    this.dispatcher = new ExecutionDispatcher({
      provider,
      pool: this.pool,
      registry: this.registry,
      stager: new CodeStager(provider, {
        workingDir: config.sandbox.workingDir,
        stagingRoot: config.stagingRoot,
      }),
      settings: config.sandbox,
      now: options.now,
      generateId: options.generateId,
    });
    this.sweeper = new ExpirationSweeper(this.registry, this.pool, {
      sessionTimeoutMs: config.sessionTimeoutMs,
      intervalMs: config.sweepIntervalMs,
      now: options.now,
    });
  }

  /** Fills the warm pool in the background and starts the sweeper. */
  start(): void {
    this.pool.scheduleReplenish();
    this.sweeper.start();
  }

  submitScript(files: ReadonlyArray<SubmittedFile>): Promise<ScriptDispatch> {
    return this.dispatcher.dispatchScript(files);
  }

  submitTests(files: ReadonlyArray<SubmittedFile>): Promise<TestDispatch> {
    return this.dispatcher.dispatchTests(files);
  }

  async pollResult(sessionId: string): Promise<PollResult> {
    const session = this.requireSession(sessionId);
    if (session.mode === "test") {
      return { state: "completed", logs: session.result?.rawOutput ?? "" };
    }

    try {
      const status = await this.provider.status(session.lease.sandbox);
      if (status.running) {
        return { state: "running" };
      }
      const logs = await this.provider.logs(session.lease.sandbox);
      this.registry.markCompleted(sessionId);
      return { state: "completed", logs };
    } catch (error) {
      // Reclaimed by cleanup or the sweeper while we were reading it
      if (isSandboxNotFoundError(error) && !this.registry.get(sessionId)) {
        throw new NotFoundError(sessionId);
      }
      throw new RetrievalError(
        `Failed to retrieve result for session ${sessionId}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async cleanup(sessionId: string): Promise<void> {
    const session = this.registry.delete(sessionId);
    if (!session) {
      throw new NotFoundError(sessionId);
    }

    try {
      await session.lease.release();
    } catch (error) {
      throw new ReclaimError(
        `Failed to clean up session ${sessionId}: ${describeError(error)}`,
        { cause: error },
      );
    }
    logger.info("Session cleaned up", {
      sessionId,
      sandboxId: session.lease.sandboxId,
    });
  }

  prewarm(): Promise<PrewarmOutcome> {
    return this.pool.prewarm();
  }

  health(): ExecutorHealth {
    return {
      sessions: this.registry.size,
      pool: { idle: this.pool.size, target: this.pool.targetSize },
    };
  }

  /**
   * Stops the sweeper and removes every pooled sandbox. Sandboxes bound to
   * sessions are left to the runtime. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.drain();
    return this.shutdownPromise;
  }

  private async drain(): Promise<void> {
    this.sweeper.stop();
    const removed = await this.pool.drain();
    logger.info("Executor shut down", {
      drainedSandboxes: removed,
      abandonedSessions: this.registry.size,
    });
  }

  private requireSession(sessionId: string): Session {
    const session = this.registry.get(sessionId);
    if (!session) {
      throw new NotFoundError(sessionId);
    }
    return session;
  }
}
