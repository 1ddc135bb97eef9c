import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  DispatchError,
  RuntimeCreationError,
  StagingError,
  ValidationError,
} from "../errors.js";
import { ExecutionDispatcher } from "../execution/dispatcher.js";
import { IDLE_COMMAND } from "../execution/sandbox-specs.js";
import { WarmPool } from "../pool/warm-pool.js";
import { SessionRegistry } from "../sessions/session-registry.js";
import { CodeStager } from "../staging/code-stager.js";
import {
  execResult,
  FakeSandboxProvider,
  testSandboxSettings,
} from "./helpers/fake-provider.js";

const INSTALL_COMMAND = "python -m pip install --quiet pytest pytest-json-report";
const PYTEST_COMMAND =
  "python -m pytest test_sample.py --json-report --json-report-file=/dev/stdout -p no:cacheprovider --no-header -v";

const file = (name: string, content: string) => ({
  name,
  content: Buffer.from(content, "utf-8"),
});

describe("ExecutionDispatcher", () => {
  let stagingRoot: string;
  let provider: FakeSandboxProvider;
  let registry: SessionRegistry;

  beforeEach(async () => {
    stagingRoot = await fs.mkdtemp(path.join(os.tmpdir(), "code-exec-dispatch-"));
    provider = new FakeSandboxProvider();
    registry = new SessionRegistry();
  });

  afterEach(async () => {
    await fs.rm(stagingRoot, { recursive: true, force: true });
  });

  async function createDispatcher(poolSize: number) {
    const pool = new WarmPool(provider, {
      targetSize: poolSize,
      idleSandboxSpec: () => ({ image: "python:3.13-slim", command: IDLE_COMMAND }),
    });
    await pool.replenish();
    let counter = 0;
    const dispatcher = new ExecutionDispatcher({
      provider,
      pool,
      registry,
      stager: new CodeStager(provider, { workingDir: "/code", stagingRoot }),
      settings: testSandboxSettings(),
      now: () => 1_000,
      generateId: () => `session-${++counter}`,
    });
    return { dispatcher, pool };
  }

  describe("script mode", () => {
    it("runs the script detached in a pooled sandbox", async () => {
      const { dispatcher, pool } = await createDispatcher(1);

      await expect(
        dispatcher.dispatchScript([file("main.py", 'print("Hello")\n')]),
      ).resolves.toEqual({ sessionId: "session-1" });

      expect(provider.injected.map((entry) => entry.sandboxId)).toEqual(["sandbox-1"]);
      expect(provider.detached).toEqual([
        {
          sandboxId: "sandbox-1",
          command: "python main.py > /proc/1/fd/1 2> /proc/1/fd/2; kill -TERM 1",
        },
      ]);
      expect(pool.size).toBe(0);

      const session = registry.get("session-1");
      expect(session).toMatchObject({ mode: "script", state: "running", createdAt: 1_000 });
      expect(session?.lease.origin).toBe("pool");
      expect(session?.lease.sandboxId).toBe("sandbox-1");
    });

    it("creates a fresh sandbox with the code mounted when the pool is empty", async () => {
      const { dispatcher } = await createDispatcher(0);

      await dispatcher.dispatchScript([file("main.py", 'print("Hello")\n')]);

      const [spec] = provider.createdSpecs;
      expect(spec.command).toEqual(["python", "main.py"]);
      const mount = spec.mounts?.[0];
      expect(mount?.target).toBe("/code");
      expect(mount?.readOnly).toBe(true);
      expect(path.dirname(mount?.source ?? "")).toBe(stagingRoot);
      await expect(
        fs.readFile(path.join(mount?.source ?? "", "main.py"), "utf-8"),
      ).resolves.toBe('print("Hello")\n');
      expect(provider.injected).toEqual([]);

      const lease = registry.get("session-1")?.lease;
      expect(lease?.origin).toBe("fresh");
      await lease?.release();
      await expect(fs.readdir(stagingRoot)).resolves.toEqual([]);
    });

    it("rejects anything but one supported file without creating a session", async () => {
      const { dispatcher } = await createDispatcher(0);

      await expect(dispatcher.dispatchScript([])).rejects.toThrow("No file provided");
      await expect(
        dispatcher.dispatchScript([file("a.py", ""), file("b.py", "")]),
      ).rejects.toThrow("Exactly one file must be submitted");
      await expect(
        dispatcher.dispatchScript([file("main.rb", "puts 1")]),
      ).rejects.toThrow('Unsupported file type for "main.rb"; expected one of: .py');
      await expect(
        dispatcher.dispatchScript([file("../main.rb", "")]),
      ).rejects.toBeInstanceOf(ValidationError);

      expect(registry.size).toBe(0);
      expect(provider.createdSpecs).toEqual([]);
    });

    it("releases a pooled sandbox when starting the script fails", async () => {
      const { dispatcher } = await createDispatcher(1);
      provider.failOn("detached", new Error("exec refused"));

      const dispatch = dispatcher.dispatchScript([file("main.py", "print(1)\n")]);

      await expect(dispatch).rejects.toBeInstanceOf(DispatchError);
      await expect(dispatch).rejects.toThrow("Failed to start script: exec refused");
      expect(provider.stopped).toEqual(["sandbox-1"]);
      expect(provider.deleted).toEqual(["sandbox-1"]);
      expect(registry.size).toBe(0);
    });

    it("releases a pooled sandbox when injecting the code fails", async () => {
      const { dispatcher } = await createDispatcher(1);
      provider.failOn("inject", new Error("disk full"));

      await expect(
        dispatcher.dispatchScript([file("main.py", "print(1)\n")]),
      ).rejects.toBeInstanceOf(StagingError);
      expect(provider.deleted).toEqual(["sandbox-1"]);
      expect(provider.detached).toEqual([]);
    });

    it("removes the staging directory when a fresh sandbox cannot be created", async () => {
      const { dispatcher } = await createDispatcher(0);
      provider.failOn("create", new Error("no such image"));

      const dispatch = dispatcher.dispatchScript([file("main.py", "print(1)\n")]);

      await expect(dispatch).rejects.toBeInstanceOf(RuntimeCreationError);
      await expect(dispatch).rejects.toThrow("Failed to create sandbox: no such image");
      await expect(fs.readdir(stagingRoot)).resolves.toEqual([]);
      expect(registry.size).toBe(0);
    });
  });

  describe("test mode", () => {
    const REPORT = JSON.stringify({
      created: 1,
      duration: 0.5,
      exitcode: 0,
      summary: { passed: 2, total: 2, collected: 2 },
    });

    it("runs pytest, classifies the result and releases the pooled sandbox", async () => {
      const { dispatcher, pool } = await createDispatcher(1);
      provider.execHandler = (command) =>
        command === PYTEST_COMMAND
          ? execResult(0, `test_sample.py::test_ok PASSED\n${REPORT}\n`)
          : execResult(0);

      const { sessionId, result } = await dispatcher.dispatchTests([
        file("test_sample.py", "def test_ok():\n    assert True\n"),
        file("helpers.py", "VALUE = 1\n"),
      ]);

      expect(sessionId).toBe("session-1");
      expect(result).toEqual({
        status: "success",
        exitCode: 0,
        summary: { passed: 2, failed: 0, total: 2, duration: 0.5 },
        rawOutput: `test_sample.py::test_ok PASSED\n${REPORT}\n`,
      });
      expect(provider.executed.map((entry) => entry.command)).toEqual([
        INSTALL_COMMAND,
        PYTEST_COMMAND,
      ]);
      expect(provider.executed[1].options).toMatchObject({ timeoutSec: 30 });
      expect(provider.stopped).toEqual(["sandbox-1"]);
      expect(provider.deleted).toEqual(["sandbox-1"]);
      expect(pool.size).toBe(0);

      const session = registry.get(sessionId);
      expect(session).toMatchObject({ mode: "test", state: "completed", result });
      expect(session?.lease.isReleased).toBe(true);
    });

    it("reports failing tests as partial success with both streams", async () => {
      const { dispatcher } = await createDispatcher(0);
      provider.execHandler = (command) =>
        command === PYTEST_COMMAND ? execResult(1, "out\n", "err\n") : execResult(0);

      const { result } = await dispatcher.dispatchTests([
        file("test_sample.py", "def test_bad():\n    assert False\n"),
      ]);

      expect(result).toEqual({
        status: "partial_success",
        exitCode: 1,
        summary: null,
        rawOutput: "out\nerr\n",
      });
    });

    it("keeps the output in the order pytest wrote it", async () => {
      const { dispatcher } = await createDispatcher(0);
      provider.execHandler = (command) =>
        command === PYTEST_COMMAND
          ? execResult(1, "FAILED\n1 failed\n", "Traceback\n", "FAILED\nTraceback\n1 failed\n")
          : execResult(0);

      const { result } = await dispatcher.dispatchTests([file("test_sample.py", "")]);

      expect(result.rawOutput).toBe("FAILED\nTraceback\n1 failed\n");
    });

    it("releases a pooled sandbox when injecting the tests fails", async () => {
      const { dispatcher, pool } = await createDispatcher(1);
      provider.failOn("inject", new Error("disk full"));

      const dispatch = dispatcher.dispatchTests([file("test_sample.py", "")]);

      await expect(dispatch).rejects.toBeInstanceOf(StagingError);
      expect(provider.stopped).toEqual(["sandbox-1"]);
      expect(provider.deleted).toEqual(["sandbox-1"]);
      expect(provider.executed).toEqual([]);
      expect(pool.size).toBe(0);
      expect(registry.size).toBe(0);
    });

    it("keeps going when installing the runner fails", async () => {
      const { dispatcher } = await createDispatcher(0);
      provider.execHandler = (command) =>
        command === INSTALL_COMMAND ? execResult(1, "", "offline\n") : execResult(0, "ok\n");

      const { result } = await dispatcher.dispatchTests([file("test_sample.py", "")]);

      expect(result.status).toBe("success");
      expect(result.rawOutput).toBe("ok\n");
    });

    it("runs fresh test sandboxes idle with the code mounted and cleans up", async () => {
      const { dispatcher } = await createDispatcher(0);

      await dispatcher.dispatchTests([file("test_sample.py", "")]);

      const [spec] = provider.createdSpecs;
      expect(spec.command).toEqual(IDLE_COMMAND);
      expect(spec.mounts?.[0]?.target).toBe("/code");
      expect(provider.deleted).toEqual(["sandbox-1"]);
      await expect(fs.readdir(stagingRoot)).resolves.toEqual([]);
    });

    it("rejects submissions without a test file before touching the runtime", async () => {
      const { dispatcher, pool } = await createDispatcher(1);

      await expect(
        dispatcher.dispatchTests([file("helpers.py", "VALUE = 1\n")]),
      ).rejects.toThrow(
        "No test files found (should end with _test.py or start with test_)",
      );
      await expect(dispatcher.dispatchTests([])).rejects.toBeInstanceOf(ValidationError);

      expect(registry.size).toBe(0);
      expect(pool.size).toBe(1);
      expect(provider.executed).toEqual([]);
    });

    it("releases the sandbox and records nothing when the run itself fails", async () => {
      const { dispatcher } = await createDispatcher(0);
      provider.failOn("exec", new Error("connection reset"));

      const dispatch = dispatcher.dispatchTests([file("test_sample.py", "")]);

      await expect(dispatch).rejects.toBeInstanceOf(DispatchError);
      await expect(dispatch).rejects.toThrow("Test run failed: connection reset");
      expect(provider.stopped).toEqual(["sandbox-1"]);
      expect(provider.deleted).toEqual(["sandbox-1"]);
      expect(registry.size).toBe(0);
      await expect(fs.readdir(stagingRoot)).resolves.toEqual([]);
    });
  });
});
