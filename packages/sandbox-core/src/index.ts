export type {
  ExecResult,
  SandboxCreateSpec,
  SandboxExecOptions,
  SandboxHandle,
  SandboxMetadata,
  SandboxMount,
  SandboxProvider,
  SandboxResourceLimits,
  SandboxState,
  SandboxStatus,
  SandboxTarget,
} from "./types.js";
export { SANDBOX_STATES } from "./types.js";
export { SandboxNotFoundError, isSandboxNotFoundError } from "./errors.js";
export {
  DEFAULT_TEST_PACKAGES,
  buildPipInstallCommand,
  buildPythonTestCommand,
  execInSandbox,
  installPythonPackages,
  runPythonTests,
} from "./runners.js";
export type {
  RunPythonTestsOptions,
  SandboxCommandTarget,
} from "./runners.js";
