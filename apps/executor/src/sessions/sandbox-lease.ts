import type { SandboxHandle, SandboxProvider } from "@code-exec/sandbox-core";
import type { StagingArea } from "../staging/code-stager.js";

export type SandboxOrigin = "pool" | "fresh";

/**
 * One-shot claim on tearing down a sandbox. Cleanup, the sweeper and the
 * dispatcher's error paths may all hold the same lease; only the first
 * `release()` reaches the runtime.
 */
export class SandboxLease {
  private released = false;

  constructor(
    readonly sandbox: SandboxHandle,
    readonly origin: SandboxOrigin,
    private readonly provider: SandboxProvider,
    private readonly staging?: StagingArea,
  ) {}

  get sandboxId(): string {
    return this.sandbox.id;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Stops and removes the sandbox, then deletes its staging directory.
   * Resolves to false when another caller already released it. Removal is
   * attempted even when stopping fails; the first runtime failure is
   * rethrown once the staging directory is gone.
   */
  async release(): Promise<boolean> {
    if (this.released) {
      return false;
    }
    this.released = true;

    let failure: unknown;
    try {
      await this.provider.stopSandbox(this.sandbox.id);
    } catch (error) {
      failure = error;
    }
    try {
      await this.provider.deleteSandbox(this.sandbox.id);
    } catch (error) {
      failure ??= error;
    } finally {
      await this.staging?.dispose();
    }

    if (failure !== undefined) {
      throw failure;
    }
    return true;
  }
}
