import path from "node:path";
import type { SandboxCreateSpec } from "@code-exec/sandbox-core";
import type { SandboxSettings } from "../config.js";

const ROLE_LABEL = "code-exec.role";

/**
 * PID 1 of an idle sandbox. It sleeps until SIGTERM so that a detached run
 * can end the container, and with it the session, by signalling PID 1.
 */
export const IDLE_COMMAND = [
  "/bin/sh",
  "-c",
  "trap 'exit 0' TERM; while :; do sleep 1; done",
];

export const SCRIPT_INTERPRETERS: Readonly<Record<string, string>> = {
  ".py": "python",
};

export function resolveInterpreter(fileName: string): string | undefined {
  const extension = path.extname(fileName).toLowerCase();
  return Object.prototype.hasOwnProperty.call(SCRIPT_INTERPRETERS, extension)
    ? SCRIPT_INTERPRETERS[extension]
    : undefined;
}

export function isTestFileName(fileName: string): boolean {
  if (path.extname(fileName) !== ".py") {
    return false;
  }
  return fileName.startsWith("test_") || fileName.endsWith("_test.py");
}

/**
 * Runs the entry file with its output routed to the container's own stdout
 * and stderr, then stops PID 1 so the container exits when the script does.
 */
export function buildDetachedScriptCommand(interpreter: string, entry: string): string {
  return `${interpreter} ${entry} > /proc/1/fd/1 2> /proc/1/fd/2; kill -TERM 1`;
}

function baseSpec(settings: SandboxSettings): Omit<SandboxCreateSpec, "command"> {
  return {
    image: settings.image,
    workingDir: settings.workingDir,
    resources: { ...settings.resources },
    networkDisabled: settings.networkDisabled,
    networkMode: settings.networkMode,
  };
}

export function buildIdleSandboxSpec(settings: SandboxSettings): SandboxCreateSpec {
  return {
    ...baseSpec(settings),
    command: IDLE_COMMAND,
    labels: { [ROLE_LABEL]: "pool" },
  };
}

/** A sandbox bound to one session with its staged code mounted read-only. */
export function buildBoundSandboxSpec(
  settings: SandboxSettings,
  command: string[],
  stagingPath: string,
): SandboxCreateSpec {
  return {
    ...baseSpec(settings),
    command,
    mounts: [{ source: stagingPath, target: settings.workingDir, readOnly: true }],
    labels: { [ROLE_LABEL]: "session" },
  };
}
