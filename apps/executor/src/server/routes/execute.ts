import type { Hono } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { describeError, isExecutorError } from "../../errors.js";
import type { TestRunStatus } from "../../execution/test-report.js";
import type { SandboxExecutor } from "../../executor.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { readUploadedFiles, respondWithError } from "./respond.js";

const logger = createLogger(LogLevel.INFO, "ExecuteRoute");

const TEST_STATUS_CODES: Record<TestRunStatus, ContentfulStatusCode> = {
  success: 200,
  partial_success: 206,
  failure: 400,
};

export function registerExecuteRoutes(app: Hono, executor: SandboxExecutor) {
  app.post("/execute", async (ctx) => {
    const requestStartedAt = Date.now();
    try {
      const files = await readUploadedFiles(ctx, "file");
      const { sessionId } = await executor.submitScript(files);
      logger.info("Script submitted", {
        sessionId,
        durationMs: Date.now() - requestStartedAt,
      });
      return ctx.json({ session_id: sessionId });
    } catch (error) {
      return respondWithError(ctx, logger, error, {
        route: "/execute",
        durationMs: Date.now() - requestStartedAt,
      });
    }
  });

  app.post("/execute_pytest", async (ctx) => {
    const requestStartedAt = Date.now();
    try {
      const files = await readUploadedFiles(ctx, "files");
      const { sessionId, result } = await executor.submitTests(files);
      logger.info("Test run completed", {
        sessionId,
        status: result.status,
        exitCode: result.exitCode,
        durationMs: Date.now() - requestStartedAt,
      });
      return ctx.json(
        {
          status: result.status,
          exit_code: result.exitCode,
          summary: result.summary,
          raw_output: result.rawOutput,
          session_id: sessionId,
        },
        TEST_STATUS_CODES[result.status],
      );
    } catch (error) {
      if (isExecutorError(error) && error.status < 500) {
        return respondWithError(ctx, logger, error, { route: "/execute_pytest" });
      }

      logger.error("Test run failed", {
        error: describeError(error),
        durationMs: Date.now() - requestStartedAt,
      });
      return ctx.json(
        { error: describeError(error), status: "failure", exit_code: -1 },
        500,
      );
    }
  });
}
