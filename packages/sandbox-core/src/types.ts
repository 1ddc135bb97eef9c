export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  result: string;
  /** Both streams interleaved in the order the command wrote them. */
  output: string;
}

export interface SandboxExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutSec?: number;
}

export interface SandboxResourceLimits {
  cpuCount?: number;
  memoryBytes?: number;
  pidsLimit?: number;
}

export interface SandboxMount {
  source: string;
  target: string;
  readOnly?: boolean;
}

export interface SandboxCreateSpec {
  image: string;
  command: string[];
  workingDir?: string;
  resources?: SandboxResourceLimits;
  networkDisabled?: boolean;
  networkMode?: string;
  mounts?: SandboxMount[];
  labels?: Record<string, string>;
}

export interface SandboxMetadata {
  containerId?: string;
  containerName?: string;
  requestedResources?: SandboxResourceLimits;
  appliedResources?: SandboxResourceLimits;
}

export interface SandboxHandle {
  id: string;
  metadata?: SandboxMetadata;
}

export const SANDBOX_STATES = [
  "created",
  "running",
  "paused",
  "restarting",
  "removing",
  "exited",
  "dead",
] as const;

export type SandboxState = (typeof SANDBOX_STATES)[number];

export interface SandboxStatus {
  state: SandboxState;
  running: boolean;
  exitCode?: number;
}

export type SandboxTarget = SandboxHandle | string;

/**
 * Capability surface the executor needs from a container runtime. Every
 * method taking a target accepts either the handle or its id; targets that
 * were never created or have been deleted reject with `SandboxNotFoundError`.
 */
export interface SandboxProvider {
  createSandbox(spec: SandboxCreateSpec): Promise<SandboxHandle>;
  injectArchive(
    target: SandboxTarget,
    containerPath: string,
    archive: Buffer,
  ): Promise<void>;
  exec(
    target: SandboxTarget,
    command: string,
    options?: SandboxExecOptions,
  ): Promise<ExecResult>;
  execDetached(
    target: SandboxTarget,
    command: string,
    options?: SandboxExecOptions,
  ): Promise<void>;
  status(target: SandboxTarget): Promise<SandboxStatus>;
  logs(target: SandboxTarget): Promise<string>;
  stopSandbox(id: string): Promise<string>;
  deleteSandbox(id: string): Promise<boolean>;
}
