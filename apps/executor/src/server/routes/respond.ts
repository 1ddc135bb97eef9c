import type { Context } from "hono";
import { ValidationError, describeError, isExecutorError } from "../../errors.js";
import type { SubmittedFile } from "../../staging/code-stager.js";
import type { LogData, Logger } from "../../utils/logger.js";

interface UploadedFile {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "arrayBuffer" in value &&
    typeof value.arrayBuffer === "function"
  );
}

/**
 * Reads every file uploaded under `field` from a multipart body. A missing
 * field yields an empty list; plain text values are rejected.
 */
export async function readUploadedFiles(
  ctx: Context,
  field: string,
): Promise<SubmittedFile[]> {
  let body: Record<string, unknown>;
  try {
    body = await ctx.req.parseBody({ all: true });
  } catch (error) {
    throw new ValidationError(
      `Invalid multipart payload: ${describeError(error)}`,
      { cause: error },
    );
  }

  const raw = body[field];
  const values: unknown[] = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];

  const files: SubmittedFile[] = [];
  for (const value of values) {
    if (!isUploadedFile(value)) {
      throw new ValidationError(`Field "${field}" must contain file uploads`);
    }
    files.push({
      name: value.name,
      content: Buffer.from(await value.arrayBuffer()),
    });
  }
  return files;
}

/**
 * Answers with `{ error }` and the error's status for executor errors;
 * anything else is rethrown to the app's error handler.
 */
export function respondWithError(
  ctx: Context,
  logger: Logger,
  error: unknown,
  context: LogData = {},
): Response {
  if (!isExecutorError(error)) {
    logger.error("Unexpected error handling request", {
      ...context,
      error: describeError(error),
    });
    throw error;
  }

  const log = error.status >= 500 ? logger.error : logger.warn;
  log("Request failed", {
    ...context,
    kind: error.kind,
    status: error.status,
    message: error.message,
  });
  return ctx.json({ error: error.message }, error.status);
}
