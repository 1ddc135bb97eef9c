import type {
  ExecResult,
  SandboxExecOptions,
  SandboxHandle,
  SandboxProvider,
} from "./types.js";

export interface SandboxCommandTarget {
  sandbox: SandboxHandle;
  provider: SandboxProvider;
}

export async function execInSandbox(
  target: SandboxCommandTarget,
  command: string,
  options: SandboxExecOptions = {},
): Promise<ExecResult> {
  return await target.provider.exec(target.sandbox, command, options);
}

export const DEFAULT_TEST_PACKAGES = ["pytest", "pytest-json-report"];

export function buildPipInstallCommand(): string {
  return ["python", "-m", "pip", "install", "--quiet", ...DEFAULT_TEST_PACKAGES].join(
    " ",
  );
}

export async function installPythonPackages(
  target: SandboxCommandTarget,
  options: SandboxExecOptions = {},
): Promise<ExecResult> {
  return await execInSandbox(target, buildPipInstallCommand(), options);
}

export interface RunPythonTestsOptions extends SandboxExecOptions {
  files: string[];
  args?: string[];
  /** Emit a pytest-json-report document on stdout after the run. */
  jsonReport?: boolean;
}

export function buildPythonTestCommand(options: RunPythonTestsOptions): string {
  const commandParts = ["python", "-m", "pytest", ...options.files];
  if (options.jsonReport) {
    commandParts.push("--json-report", "--json-report-file=/dev/stdout");
  }
  commandParts.push(...(options.args ?? []));

  return commandParts.join(" ");
}

export async function runPythonTests(
  target: SandboxCommandTarget,
  options: RunPythonTestsOptions,
): Promise<ExecResult> {
  const { cwd, env, timeoutSec } = options;
  return await execInSandbox(target, buildPythonTestCommand(options), {
    cwd,
    env,
    timeoutSec,
  });
}
