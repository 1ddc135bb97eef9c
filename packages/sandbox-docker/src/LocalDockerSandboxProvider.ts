import Docker from "dockerode";
import { randomUUID } from "node:crypto";
import { Readable, Writable } from "node:stream";
import type { Container } from "dockerode";
import {
  SANDBOX_STATES,
  SandboxNotFoundError,
} from "@code-exec/sandbox-core";
import type {
  ExecResult,
  SandboxCreateSpec,
  SandboxExecOptions,
  SandboxHandle,
  SandboxMount,
  SandboxProvider,
  SandboxResourceLimits,
  SandboxState,
  SandboxStatus,
  SandboxTarget,
} from "@code-exec/sandbox-core";

const DEFAULT_TMPFS_OPTS = "rw,nosuid,nodev,size=64m";
const DEFAULT_WORKING_DIR = "/code";
const DEFAULT_CPU_COUNT = 1;
const DEFAULT_MEMORY_LIMIT_BYTES = 256 * 1024 * 1024;
const DEFAULT_EXEC_TIMEOUT_SEC = 300;
const DEFAULT_PIDS_LIMIT = 128;
const SECURITY_VIOLATION_EXIT_CODE = 126;
const TIMEOUT_EXIT_CODE = 124;
const SANDBOX_LABEL = "code-exec.sandbox";

class CommandTimeoutError extends Error {
  constructor(readonly seconds: number) {
    super(`Command timed out after ${seconds} seconds`);
    this.name = "CommandTimeoutError";
  }
}

export interface LocalDockerSandboxOptions {
  /** Pre-built client; takes precedence over `dockerOptions`. */
  docker?: Docker;
  dockerOptions?: Docker.DockerOptions;
  user?: string;
  tmpfsOptions?: string;
  defaultTimeoutSec?: number;
}

type CapturedOutput = {
  stdout: string;
  stderr: string;
  combined: string;
};

type InternalSandboxRecord = {
  container: Container;
  workingDir: string;
};

function isSandboxState(value: string | undefined): value is SandboxState {
  return SANDBOX_STATES.some((state) => state === value);
}

export function buildBinds(mounts: SandboxMount[] = []): string[] {
  return mounts.map(
    (mount) => `${mount.source}:${mount.target}:${mount.readOnly ? "ro" : "rw"}`,
  );
}

export class LocalDockerSandboxProvider implements SandboxProvider {
  private readonly docker: Docker;
  private readonly sandboxes = new Map<string, InternalSandboxRecord>();
  private readonly options: LocalDockerSandboxOptions;

  constructor(options: LocalDockerSandboxOptions = {}) {
    this.docker = options.docker ?? new Docker(options.dockerOptions);
    this.options = options;
  }

  async createSandbox(spec: SandboxCreateSpec): Promise<SandboxHandle> {
    const networkMode = spec.networkDisabled
      ? "none"
      : spec.networkMode ?? "bridge";

    const requestedCpuCount = spec.resources?.cpuCount;
    const effectiveCpuCount =
      requestedCpuCount && requestedCpuCount > 0
        ? requestedCpuCount
        : DEFAULT_CPU_COUNT;
    const nanoCpus = Math.floor(effectiveCpuCount * 1_000_000_000);

    const requestedMemory = spec.resources?.memoryBytes;
    const memoryBytes =
      requestedMemory && requestedMemory > 0
        ? requestedMemory
        : DEFAULT_MEMORY_LIMIT_BYTES;

    const requestedPidsLimit = spec.resources?.pidsLimit;
    const pidsLimit =
      requestedPidsLimit && requestedPidsLimit > 0
        ? requestedPidsLimit
        : DEFAULT_PIDS_LIMIT;

    const workingDir = spec.workingDir ?? DEFAULT_WORKING_DIR;

    const hostConfig: Docker.ContainerCreateOptions["HostConfig"] = {
      Binds: buildBinds(spec.mounts),
      Tmpfs: {
        "/tmp": this.options.tmpfsOptions ?? DEFAULT_TMPFS_OPTS,
      },
      CapDrop: ["ALL"],
      SecurityOpt: ["no-new-privileges"],
      NetworkMode: networkMode,
      NanoCpus: nanoCpus,
      Memory: memoryBytes,
      PidsLimit: pidsLimit,
    };

    const createOpts: Docker.ContainerCreateOptions = {
      Image: spec.image,
      Cmd: spec.command,
      Tty: false,
      OpenStdin: false,
      AttachStderr: false,
      AttachStdout: false,
      WorkingDir: workingDir,
      // Unset runs as the image's own user
      User: this.options.user,
      NetworkDisabled: Boolean(spec.networkDisabled),
      HostConfig: hostConfig,
      Labels: {
        ...spec.labels,
        [SANDBOX_LABEL]: "local-docker",
      },
    };

    const container = await this.docker.createContainer(createOpts);

    try {
      await container.start();
    } catch (error) {
      await this.safeRemove(container);
      throw error;
    }

    const inspectData = await container.inspect();
    const id = container.id ?? randomUUID();
    const requestedResources: SandboxResourceLimits = {
      cpuCount: effectiveCpuCount,
      memoryBytes,
      pidsLimit,
    };
    const appliedResources: SandboxResourceLimits = {
      cpuCount:
        typeof inspectData.HostConfig?.NanoCpus === "number" &&
        inspectData.HostConfig.NanoCpus > 0
          ? inspectData.HostConfig.NanoCpus / 1_000_000_000
          : undefined,
      memoryBytes:
        typeof inspectData.HostConfig?.Memory === "number" &&
        inspectData.HostConfig.Memory > 0
          ? inspectData.HostConfig.Memory
          : undefined,
      pidsLimit:
        typeof inspectData.HostConfig?.PidsLimit === "number" &&
        inspectData.HostConfig.PidsLimit > 0
          ? inspectData.HostConfig.PidsLimit
          : undefined,
    };
    const handle: SandboxHandle = {
      id,
      metadata: {
        containerId: id,
        containerName: inspectData.Name?.replace(/^\//, ""),
        requestedResources,
        appliedResources,
      },
    };

    this.sandboxes.set(id, { container, workingDir });
    return handle;
  }

  async injectArchive(
    target: SandboxTarget,
    containerPath: string,
    archive: Buffer,
  ): Promise<void> {
    const record = this.requireRecord(target);
    await record.container.putArchive(archive, { path: containerPath });
  }

  async exec(
    target: SandboxTarget,
    command: string,
    options: SandboxExecOptions = {},
  ): Promise<ExecResult> {
    const record = this.requireRecord(target);

    return await this.executeCommand(
      record.container,
      record.workingDir,
      command,
      options.cwd,
      options.env,
      options.timeoutSec,
    );
  }

  async execDetached(
    target: SandboxTarget,
    command: string,
    options: SandboxExecOptions = {},
  ): Promise<void> {
    const record = this.requireRecord(target);

    const exec = await record.container.exec({
      Cmd: ["/bin/sh", "-c", command],
      WorkingDir: options.cwd ?? record.workingDir,
      Env: this.formatEnv(options.env),
      AttachStdout: false,
      AttachStderr: false,
      AttachStdin: false,
    });

    await exec.start({ Detach: true });
  }

  async status(target: SandboxTarget): Promise<SandboxStatus> {
    const record = this.requireRecord(target);
    const inspectData = await record.container.inspect();
    const rawState = inspectData.State?.Status;
    const state: SandboxState = isSandboxState(rawState)
      ? rawState
      : inspectData.State?.Running
        ? "running"
        : "exited";

    return {
      state,
      running: state === "running" || state === "restarting",
      exitCode:
        typeof inspectData.State?.ExitCode === "number" && state === "exited"
          ? inspectData.State.ExitCode
          : undefined,
    };
  }

  async logs(target: SandboxTarget): Promise<string> {
    const record = this.requireRecord(target);
    const payload = await record.container.logs({
      stdout: true,
      stderr: true,
      follow: false,
    });
    // Non-TTY containers frame every chunk with its stream id
    const captured = await this.captureOutput(Readable.from([payload]));
    return captured.combined;
  }

  async stopSandbox(id: string): Promise<string> {
    const record = this.sandboxes.get(id);
    if (!record) {
      throw new SandboxNotFoundError(id);
    }

    await this.safeStop(record.container);
    return id;
  }

  async deleteSandbox(id: string): Promise<boolean> {
    const record = this.sandboxes.get(id);
    if (!record) {
      return false;
    }

    await this.safeStop(record.container);
    await this.safeRemove(record.container);
    this.sandboxes.delete(id);
    return true;
  }

  private requireRecord(target: SandboxTarget): InternalSandboxRecord {
    const id = typeof target === "string" ? target : target.id;
    const record = this.sandboxes.get(id);
    if (!record) {
      throw new SandboxNotFoundError(id);
    }
    return record;
  }

  private formatEnv(env?: Record<string, string>): string[] | undefined {
    return env
      ? Object.entries(env).map(([key, value]) => `${key}=${value}`)
      : undefined;
  }

  private async executeCommand(
    container: Container,
    defaultWorkingDir: string,
    command: string,
    cwd?: string,
    env?: Record<string, string>,
    timeoutSec?: number,
  ): Promise<ExecResult> {
    const exec = await container.exec({
      Cmd: ["/bin/sh", "-lc", command],
      WorkingDir: cwd ?? defaultWorkingDir,
      Env: this.formatEnv(env),
      AttachStdout: true,
      AttachStderr: true,
      AttachStdin: false,
    });

    const execPromise = this.collectExecResult(exec).catch((error: unknown) => {
      if (this.isSecurityViolationError(error)) {
        return this.buildFailureResult(
          SECURITY_VIOLATION_EXIT_CODE,
          this.normalizeErrorMessage(error),
        );
      }
      throw error instanceof Error ? error : new Error(String(error));
    });

    const effectiveTimeout = this.resolveTimeout(timeoutSec);

    if (!effectiveTimeout) {
      return execPromise;
    }

    const timeoutMs = effectiveTimeout * 1000;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<ExecResult>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        container
          .kill({ signal: "SIGKILL" })
          .then(() => reject(new CommandTimeoutError(effectiveTimeout)))
          .catch((error: unknown) => {
            if (!this.isContainerNotRunningError(error)) {
              reject(error instanceof Error ? error : new Error(String(error)));
              return;
            }
            reject(new CommandTimeoutError(effectiveTimeout));
          });
      }, timeoutMs);
    });

    try {
      return await Promise.race([execPromise, timeoutPromise]);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        void execPromise.catch(() => undefined);
        return this.buildFailureResult(TIMEOUT_EXIT_CODE, error.message);
      }

      throw error;
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }

  private resolveTimeout(timeoutSec?: number): number | undefined {
    const defaultTimeout = this.options.defaultTimeoutSec ?? DEFAULT_EXEC_TIMEOUT_SEC;
    const candidate = timeoutSec ?? defaultTimeout;
    if (!candidate || candidate <= 0) {
      return undefined;
    }
    return candidate;
  }

  private async collectExecResult(exec: Docker.Exec): Promise<ExecResult> {
    const stream = await exec.start({ hijack: true, stdin: false });
    const { stdout, stderr, combined } = await this.captureOutput(stream);

    const inspectData = await exec.inspect();
    const exitCode = inspectData.ExitCode ?? 0;

    return {
      exitCode,
      stdout,
      stderr,
      result: stdout.trim(),
      output: combined,
    };
  }

  /**
   * Splits a multiplexed Docker stream with the modem's demuxer. Frames are
   * also appended to `combined` in the order they arrive.
   */
  private async captureOutput(stream: Readable): Promise<CapturedOutput> {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const combinedChunks: Buffer[] = [];

    const collectInto = (chunks: Buffer[]) =>
      new Writable({
        write(chunk: Buffer, _encoding, callback) {
          const copy = Buffer.from(chunk);
          chunks.push(copy);
          combinedChunks.push(copy);
          callback();
        },
      });
    const stdoutStream = collectInto(stdoutChunks);
    const stderrStream = collectInto(stderrChunks);

    this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

    await new Promise<void>((resolve, reject) => {
      stream.on("end", resolve);
      stream.on("close", resolve);
      stream.on("error", (error: Error) => reject(error));
    });

    stdoutStream.end();
    stderrStream.end();

    return {
      stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
      stderr: Buffer.concat(stderrChunks).toString("utf-8"),
      combined: Buffer.concat(combinedChunks).toString("utf-8"),
    };
  }

  private isSecurityViolationError(error: unknown): boolean {
    const message = this.normalizeErrorMessage(error).toLowerCase();
    if (!message) {
      return false;
    }

    return (
      message.includes("operation not permitted") ||
      message.includes("permission denied") ||
      message.includes("apparmor") ||
      message.includes("seccomp") ||
      message.includes("security profile") ||
      message.includes("no new privileges")
    );
  }

  private normalizeErrorMessage(error: unknown): string {
    if (!error) {
      return "";
    }
    if (error instanceof Error) {
      return error.message || error.toString();
    }
    return String(error);
  }

  private buildFailureResult(exitCode: number, stderr: string): ExecResult {
    return {
      exitCode,
      stdout: "",
      stderr,
      result: "",
      output: stderr,
    };
  }

  private isContainerNotRunningError(error: unknown): boolean {
    if (!error) {
      return false;
    }
    const message = error instanceof Error ? error.message : String(error);
    return message.includes("not running") || message.includes("is not running");
  }

  private async safeStop(container: Container): Promise<void> {
    try {
      await container.stop({ t: 0 });
    } catch (error) {
      if (this.isContainerNotRunningError(error) || this.isNotModifiedError(error)) {
        return;
      }
      throw error;
    }
  }

  private isNotModifiedError(error: unknown): boolean {
    return (
      typeof error === "object" &&
      error !== null &&
      "statusCode" in error &&
      error.statusCode === 304
    );
  }

  private async safeRemove(container: Container): Promise<void> {
    try {
      await container.remove({ force: true });
    } catch (error) {
      if (error instanceof Error && error.message.includes("No such container")) {
        return;
      }
      throw error;
    }
  }
}
