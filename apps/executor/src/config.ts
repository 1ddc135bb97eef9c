import os from "node:os";
import { z } from "zod";
import type { SandboxResourceLimits } from "@code-exec/sandbox-core";

const DEFAULT_SANDBOX_IMAGE = "python:3.13-slim";
const DEFAULT_MEMORY_LIMIT_BYTES = 128 * 1024 * 1024;
const DISABLED_NETWORK_VALUES = ["none", "false", "off", "disable", "disabled"];

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveInt = (fallback: number) =>
  optionalString.pipe(z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  optionalString.pipe(z.coerce.number().int().nonnegative().default(fallback));

const positiveFloat = (fallback: number) =>
  optionalString.pipe(z.coerce.number().positive().default(fallback));

const envSchema = z.object({
  EXECUTOR_PORT: positiveInt(5000),
  SANDBOX_IMAGE: optionalString.transform((value) => value ?? DEFAULT_SANDBOX_IMAGE),
  SANDBOX_CPU_COUNT: positiveFloat(0.5),
  SANDBOX_MEMORY_BYTES: positiveInt(DEFAULT_MEMORY_LIMIT_BYTES),
  SANDBOX_PIDS_LIMIT: positiveInt(128),
  SANDBOX_NETWORK: optionalString,
  SANDBOX_WORKDIR: optionalString.transform((value) => value ?? "/code"),
  SANDBOX_USER: optionalString,
  SANDBOX_EXEC_TIMEOUT_SEC: positiveInt(300),
  SESSION_TIMEOUT_SEC: positiveInt(10),
  SWEEP_INTERVAL_SEC: positiveInt(5),
  WARM_POOL_SIZE: nonNegativeInt(1),
  STAGING_ROOT: optionalString,
});

export interface SandboxSettings {
  image: string;
  workingDir: string;
  resources: SandboxResourceLimits;
  networkDisabled: boolean;
  networkMode?: string;
  /** `uid:gid` for sandbox processes; unset keeps the image's user. */
  user?: string;
  execTimeoutSec: number;
}

export interface ExecutorConfig {
  port: number;
  sandbox: SandboxSettings;
  sessionTimeoutMs: number;
  sweepIntervalMs: number;
  warmPoolSize: number;
  stagingRoot: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function resolveNetwork(raw: string | undefined): {
  networkDisabled: boolean;
  networkMode?: string;
} {
  if (!raw || DISABLED_NETWORK_VALUES.includes(raw.toLowerCase())) {
    return { networkDisabled: true };
  }
  return { networkDisabled: false, networkMode: raw };
}

export function loadExecutorConfig(
  env: NodeJS.ProcessEnv = process.env,
): ExecutorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid executor configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.EXECUTOR_PORT,
    sandbox: {
      image: values.SANDBOX_IMAGE,
      workingDir: values.SANDBOX_WORKDIR,
      resources: {
        cpuCount: values.SANDBOX_CPU_COUNT,
        memoryBytes: values.SANDBOX_MEMORY_BYTES,
        pidsLimit: values.SANDBOX_PIDS_LIMIT,
      },
      ...resolveNetwork(values.SANDBOX_NETWORK),
      user: values.SANDBOX_USER,
      execTimeoutSec: values.SANDBOX_EXEC_TIMEOUT_SEC,
    },
    sessionTimeoutMs: values.SESSION_TIMEOUT_SEC * 1000,
    sweepIntervalMs: values.SWEEP_INTERVAL_SEC * 1000,
    warmPoolSize: values.WARM_POOL_SIZE,
    stagingRoot: values.STAGING_ROOT ?? os.tmpdir(),
  };
}
