export class SandboxNotFoundError extends Error {
  constructor(readonly sandboxId: string) {
    super(`Sandbox ${sandboxId} not found`);
    this.name = "SandboxNotFoundError";
  }
}

export function isSandboxNotFoundError(
  error: unknown,
): error is SandboxNotFoundError {
  return error instanceof SandboxNotFoundError;
}
