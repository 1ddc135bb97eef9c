import { z } from "zod";

export type TestRunStatus = "success" | "partial_success" | "failure";

export interface TestSummary {
  passed: number;
  failed: number;
  total: number;
  duration: number;
}

export interface TestRunResult {
  status: TestRunStatus;
  exitCode: number;
  summary: TestSummary | null;
  rawOutput: string;
}

/** pytest exits 1 when the run completed but some tests failed. */
export function classifyExitCode(exitCode: number): TestRunStatus {
  if (exitCode === 0) {
    return "success";
  }
  if (exitCode === 1) {
    return "partial_success";
  }
  return "failure";
}

const count = z.number().nonnegative().default(0);

const legacyReportSchema = z.object({
  report: z.object({
    passed: count,
    failed: count,
    total: count,
    duration: count,
  }),
});

// Shape written by pytest-json-report
const jsonReportSchema = z.object({
  duration: count,
  summary: z.object({
    passed: count,
    failed: count,
    total: count,
  }),
});

const REPORT_START = /\{\s*"(?:report|created)"\s*:/g;

/**
 * Returns the balanced JSON object starting at `start`, or undefined when the
 * braces never close.
 */
export function extractJsonObject(text: string, start: number): string | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index++) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return undefined;
}

function toSummary(document: unknown): TestSummary | null {
  const legacy = legacyReportSchema.safeParse(document);
  if (legacy.success) {
    return { ...legacy.data.report };
  }

  const report = jsonReportSchema.safeParse(document);
  if (report.success) {
    return {
      passed: report.data.summary.passed,
      failed: report.data.summary.failed,
      total: report.data.summary.total,
      duration: report.data.duration,
    };
  }
  return null;
}

/**
 * Finds a machine-readable test report embedded in the run output and
 * reduces it to pass/fail counts. Anything unparseable yields null.
 */
export function parseTestSummary(output: string): TestSummary | null {
  for (const match of output.matchAll(REPORT_START)) {
    const candidate = extractJsonObject(output, match.index ?? 0);
    if (!candidate) {
      continue;
    }

    let document: unknown;
    try {
      document = JSON.parse(candidate);
    } catch {
      continue;
    }

    const summary = toSummary(document);
    if (summary) {
      return summary;
    }
  }
  return null;
}
