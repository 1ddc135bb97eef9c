export { LocalDockerSandboxProvider, buildBinds } from "./LocalDockerSandboxProvider.js";
export type { LocalDockerSandboxOptions } from "./LocalDockerSandboxProvider.js";
