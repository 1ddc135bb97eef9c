import { v4 as uuidv4 } from "uuid";
import {
  installPythonPackages,
  runPythonTests,
} from "@code-exec/sandbox-core";
import type { SandboxHandle, SandboxProvider } from "@code-exec/sandbox-core";
import type { SandboxSettings } from "../config.js";
import {
  DispatchError,
  RuntimeCreationError,
  ValidationError,
  describeError,
  wrapRuntimeError,
} from "../errors.js";
import type { WarmPool } from "../pool/warm-pool.js";
import { SandboxLease } from "../sessions/sandbox-lease.js";
import type { SessionRegistry } from "../sessions/session-registry.js";
import type {
  CodeBundle,
  CodeStager,
  StagingArea,
  SubmittedFile,
} from "../staging/code-stager.js";
import { createLogger, LogLevel } from "../utils/logger.js";
import {
  IDLE_COMMAND,
  SCRIPT_INTERPRETERS,
  buildBoundSandboxSpec,
  buildDetachedScriptCommand,
  isTestFileName,
  resolveInterpreter,
} from "./sandbox-specs.js";
import {
  classifyExitCode,
  parseTestSummary,
  type TestRunResult,
} from "./test-report.js";

const logger = createLogger(LogLevel.INFO, "Dispatcher");

const PYTEST_ARGS = ["-p", "no:cacheprovider", "--no-header", "-v"];

export interface ExecutionDispatcherOptions {
  provider: SandboxProvider;
  pool: WarmPool;
  registry: SessionRegistry;
  stager: CodeStager;
  settings: SandboxSettings;
  now?: () => number;
  generateId?: () => string;
}

export interface ScriptDispatch {
  sessionId: string;
}

export interface TestDispatch {
  sessionId: string;
  result: TestRunResult;
}

export class ExecutionDispatcher {
  private readonly provider: SandboxProvider;
  private readonly pool: WarmPool;
  private readonly registry: SessionRegistry;
  private readonly stager: CodeStager;
  private readonly settings: SandboxSettings;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: ExecutionDispatcherOptions) {
    this.provider = options.provider;
    this.pool = options.pool;
    this.registry = options.registry;
    this.stager = options.stager;
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? uuidv4;
  }

  /**
   * Starts a single script without waiting for it. The returned session is
   * polled for logs later and is reclaimed by cleanup or the sweeper.
   */
  async dispatchScript(files: ReadonlyArray<SubmittedFile>): Promise<ScriptDispatch> {
    if (files.length === 0) {
      throw new ValidationError("No file provided");
    }
    if (files.length > 1) {
      throw new ValidationError("Exactly one file must be submitted");
    }

    const bundle = await this.stager.createBundle(files);
    const entry = bundle.files[0].name;
    const interpreter = resolveInterpreter(entry);
    if (!interpreter) {
      throw new ValidationError(
        `Unsupported file type for "${entry}"; expected one of: ${Object.keys(
          SCRIPT_INTERPRETERS,
        ).join(", ")}`,
      );
    }

    const sessionId = this.generateId();
    const lease = await this.startScript(sessionId, bundle, entry, interpreter);
    await this.record(sessionId, lease, () =>
      this.registry.create({
        id: sessionId,
        lease,
        mode: "script",
        createdAt: this.now(),
      }),
    );

    logger.info("Script session started", {
      sessionId,
      sandboxId: lease.sandboxId,
      origin: lease.origin,
      entry,
    });
    return { sessionId };
  }

  /**
   * Runs the submitted test files to completion. The sandbox is released
   * before this resolves or rejects; the session is recorded with its result.
   */
  async dispatchTests(files: ReadonlyArray<SubmittedFile>): Promise<TestDispatch> {
    if (files.length === 0) {
      throw new ValidationError("No files provided");
    }

    const bundle = await this.stager.createBundle(files);
    const testFiles = bundle.files
      .map((file) => file.name)
      .filter((name) => isTestFileName(name));
    if (testFiles.length === 0) {
      throw new ValidationError(
        "No test files found (should end with _test.py or start with test_)",
      );
    }

    const sessionId = this.generateId();
    const lease = await this.prepareTestSandbox(sessionId, bundle);

    const result = await this.runTests(lease.sandbox, testFiles)
      .catch((error: unknown) => {
        throw wrapRuntimeError(DispatchError, "Test run failed", error);
      })
      .finally(() => this.releaseQuietly(lease, sessionId));

    this.registry.create({
      id: sessionId,
      lease,
      mode: "test",
      createdAt: this.now(),
      state: "completed",
      result,
    });

    logger.info("Test session finished", {
      sessionId,
      origin: lease.origin,
      status: result.status,
      exitCode: result.exitCode,
      summary: result.summary,
    });
    return { sessionId, result };
  }

  private async startScript(
    sessionId: string,
    bundle: CodeBundle,
    entry: string,
    interpreter: string,
  ): Promise<SandboxLease> {
    const pooled = this.pool.acquire();
    if (pooled) {
      const lease = new SandboxLease(pooled, "pool", this.provider);
      try {
        await this.stager.inject(bundle, pooled);
        await this.provider.execDetached(
          pooled,
          buildDetachedScriptCommand(interpreter, entry),
        );
      } catch (error) {
        await this.releaseQuietly(lease, sessionId);
        throw wrapRuntimeError(DispatchError, "Failed to start script", error);
      }
      return lease;
    }

    const staging = await this.stager.materialize(bundle, sessionId);
    const sandbox = await this.createBoundSandbox(staging, [interpreter, entry]);
    return new SandboxLease(sandbox, "fresh", this.provider, staging);
  }

  private async prepareTestSandbox(
    sessionId: string,
    bundle: CodeBundle,
  ): Promise<SandboxLease> {
    const pooled = this.pool.acquire();
    if (pooled) {
      const lease = new SandboxLease(pooled, "pool", this.provider);
      try {
        await this.stager.inject(bundle, pooled);
      } catch (error) {
        await this.releaseQuietly(lease, sessionId);
        throw error;
      }
      return lease;
    }

    const staging = await this.stager.materialize(bundle, sessionId);
    const sandbox = await this.createBoundSandbox(staging, IDLE_COMMAND);
    return new SandboxLease(sandbox, "fresh", this.provider, staging);
  }

  private async createBoundSandbox(
    staging: StagingArea,
    command: string[],
  ): Promise<SandboxHandle> {
    try {
      return await this.provider.createSandbox(
        buildBoundSandboxSpec(this.settings, command, staging.path),
      );
    } catch (error) {
      await staging.dispose();
      throw new RuntimeCreationError(
        `Failed to create sandbox: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private async runTests(
    sandbox: SandboxHandle,
    testFiles: string[],
  ): Promise<TestRunResult> {
    const target = { sandbox, provider: this.provider };
    const timeoutSec = this.settings.execTimeoutSec;

    const install = await installPythonPackages(target, { timeoutSec });
    if (install.exitCode !== 0) {
      logger.warn("Test runner installation exited non-zero", {
        sandboxId: sandbox.id,
        exitCode: install.exitCode,
      });
    }

    const run = await runPythonTests(target, {
      files: testFiles,
      jsonReport: true,
      args: PYTEST_ARGS,
      timeoutSec,
    });
    return {
      status: classifyExitCode(run.exitCode),
      exitCode: run.exitCode,
      summary: parseTestSummary(run.output),
      rawOutput: run.output,
    };
  }

  private async record(
    sessionId: string,
    lease: SandboxLease,
    create: () => void,
  ): Promise<void> {
    try {
      create();
    } catch (error) {
      await this.releaseQuietly(lease, sessionId);
      throw new DispatchError(
        `Failed to record session: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private async releaseQuietly(lease: SandboxLease, sessionId: string): Promise<void> {
    try {
      await lease.release();
    } catch (error) {
      logger.error("Failed to release sandbox", {
        sessionId,
        sandboxId: lease.sandboxId,
        error: describeError(error),
      });
    }
  }
}
