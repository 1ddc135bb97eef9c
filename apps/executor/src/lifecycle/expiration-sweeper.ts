import { ReclaimError, describeError } from "../errors.js";
import type { WarmPool } from "../pool/warm-pool.js";
import type { SessionRegistry } from "../sessions/session-registry.js";
import { createLogger, LogLevel } from "../utils/logger.js";

const logger = createLogger(LogLevel.INFO, "ExpirationSweeper");

export interface SweeperConfig {
  /** Sessions older than this are reclaimed. */
  sessionTimeoutMs: number;
  intervalMs: number;
  now?: () => number;
}

export class ExpirationSweeper {
  private readonly config: SweeperConfig;
  private readonly now: () => number;
  private intervalId: NodeJS.Timeout | null = null;
  private isSweeping = false;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly pool: WarmPool,
    config: SweeperConfig,
  ) {
    this.config = config;
    this.now = config.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      void this.sweep().catch((error: unknown) => {
        logger.error("Sweep failed", { error: describeError(error) });
      });
    }, this.config.intervalMs);
    this.intervalId.unref();
    logger.info("Sweeper started", {
      intervalMs: this.config.intervalMs,
      sessionTimeoutMs: this.config.sessionTimeoutMs,
    });
  }

  stop(): void {
    if (!this.intervalId) return;

    clearInterval(this.intervalId);
    this.intervalId = null;
    logger.info("Sweeper stopped");
  }

  /**
   * Reclaims every session past its timeout, then tops up the pool. Resolves
   * to the number of sessions removed; 0 when a previous sweep is still
   * running.
   */
  async sweep(): Promise<number> {
    if (this.isSweeping) {
      logger.debug("Previous sweep still running, skipping");
      return 0;
    }

    this.isSweeping = true;
    try {
      const now = this.now();
      const expired = this.registry
        .listAll()
        .filter((session) => now - session.createdAt > this.config.sessionTimeoutMs);

      let removed = 0;
      for (const snapshot of expired) {
        // Cleanup may have won the race since the snapshot was taken
        const session = this.registry.delete(snapshot.id);
        if (!session) continue;

        removed++;
        logger.info("Session timed out", {
          sessionId: session.id,
          sandboxId: session.lease.sandboxId,
          ageMs: now - session.createdAt,
        });
        try {
          await session.lease.release();
        } catch (error) {
          const reclaimError = new ReclaimError(
            `Failed to reclaim sandbox ${session.lease.sandboxId}: ${describeError(error)}`,
            { cause: error },
          );
          logger.warn(reclaimError.message, { sessionId: session.id });
        }
      }

      this.pool.scheduleReplenish();
      return removed;
    } finally {
      this.isSweeping = false;
    }
  }
}
