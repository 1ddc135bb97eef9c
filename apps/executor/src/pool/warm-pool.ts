import type {
  SandboxCreateSpec,
  SandboxHandle,
  SandboxProvider,
} from "@code-exec/sandbox-core";
import { RuntimeCreationError, describeError } from "../errors.js";
import { createLogger, LogLevel } from "../utils/logger.js";

const logger = createLogger(LogLevel.INFO, "WarmPool");

export interface WarmPoolOptions {
  targetSize: number;
  /** Spec for an idle sandbox; called once per creation. */
  idleSandboxSpec: () => SandboxCreateSpec;
}

export type PrewarmOutcome = "created" | "full";

/**
 * Reserve of idle sandboxes. `idle` is only touched synchronously, so an
 * `acquire()` can never hand the same sandbox to two callers. Creations in
 * flight count against the target so the pool never grows past it.
 */
export class WarmPool {
  private readonly idle: SandboxHandle[] = [];
  private pending = 0;
  private draining = false;

  constructor(
    private readonly provider: SandboxProvider,
    private readonly options: WarmPoolOptions,
  ) {}

  get size(): number {
    return this.idle.length;
  }

  get targetSize(): number {
    return this.options.targetSize;
  }

  get inFlight(): number {
    return this.pending;
  }

  acquire(): SandboxHandle | undefined {
    const sandbox = this.idle.shift();
    if (sandbox) {
      logger.debug("Acquired pooled sandbox", {
        sandboxId: sandbox.id,
        remaining: this.idle.length,
      });
    }
    return sandbox;
  }

  private get deficit(): number {
    return Math.max(0, this.options.targetSize - this.idle.length - this.pending);
  }

  /**
   * Creates sandboxes until the pool reaches its target. Failures are logged
   * and skipped. Resolves to the number of sandboxes added.
   */
  async replenish(): Promise<number> {
    if (this.draining) {
      return 0;
    }
    const missing = this.deficit;
    if (missing === 0) {
      return 0;
    }

    const results = await Promise.all(
      Array.from({ length: missing }, () =>
        this.createIdle().then(
          (sandbox) => sandbox !== undefined,
          (error: unknown) => {
            logger.warn("Failed to create pooled sandbox", {
              error: describeError(error),
            });
            return false;
          },
        ),
      ),
    );
    return results.filter(Boolean).length;
  }

  /** Replenishes in the background; never blocks or rejects. */
  scheduleReplenish(): void {
    void this.replenish().catch((error: unknown) => {
      logger.error("Pool replenishment failed", { error: describeError(error) });
    });
  }

  /** Adds one sandbox unless the pool is already at its target. */
  async prewarm(): Promise<PrewarmOutcome> {
    if (this.draining || this.deficit === 0) {
      return "full";
    }
    let sandbox: SandboxHandle | undefined;
    try {
      sandbox = await this.createIdle();
    } catch (error) {
      throw new RuntimeCreationError(
        `Failed to prewarm sandbox: ${describeError(error)}`,
        { cause: error },
      );
    }
    return sandbox ? "created" : "full";
  }

  /** Stops and removes every idle sandbox. Errors are logged, never thrown. */
  async drain(): Promise<number> {
    this.draining = true;
    const sandboxes = this.idle.splice(0, this.idle.length);
    await Promise.all(sandboxes.map((sandbox) => this.discard(sandbox)));
    if (sandboxes.length > 0) {
      logger.info("Drained warm pool", { removed: sandboxes.length });
    }
    return sandboxes.length;
  }

  /** Resolves to undefined when a drain started while the sandbox was created. */
  private async createIdle(): Promise<SandboxHandle | undefined> {
    const spec = this.options.idleSandboxSpec();
    this.pending++;
    const sandbox = await this.provider
      .createSandbox(spec)
      .finally(() => {
        this.pending--;
      });

    if (this.draining) {
      await this.discard(sandbox);
      return undefined;
    }

    this.idle.push(sandbox);
    logger.info("Pooled sandbox ready", {
      sandboxId: sandbox.id,
      size: this.idle.length,
      target: this.options.targetSize,
    });
    return sandbox;
  }

  private async discard(sandbox: SandboxHandle): Promise<void> {
    try {
      await this.provider.stopSandbox(sandbox.id);
    } catch (error) {
      logger.warn("Failed to stop pooled sandbox", {
        sandboxId: sandbox.id,
        error: describeError(error),
      });
    }
    try {
      await this.provider.deleteSandbox(sandbox.id);
    } catch (error) {
      logger.warn("Failed to remove pooled sandbox", {
        sandboxId: sandbox.id,
        error: describeError(error),
      });
    }
  }
}
