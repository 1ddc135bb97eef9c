import { describe, expect, it, jest } from "@jest/globals";
import {
  buildPipInstallCommand,
  buildPythonTestCommand,
  execInSandbox,
  installPythonPackages,
  runPythonTests,
} from "../runners.js";
import type { ExecResult, SandboxHandle, SandboxProvider } from "../types.js";

const OK: ExecResult = { exitCode: 0, stdout: "ok", stderr: "", result: "ok", output: "ok" };

const handle: SandboxHandle = { id: "sandbox-1" };

function createProvider() {
  const exec = jest.fn<SandboxProvider["exec"]>().mockResolvedValue(OK);
  const provider = { exec } as unknown as SandboxProvider;
  return { provider, exec };
}

describe("buildPipInstallCommand", () => {
  it("installs the test runner packages", () => {
    expect(buildPipInstallCommand()).toBe(
      "python -m pip install --quiet pytest pytest-json-report",
    );
  });
});

describe("buildPythonTestCommand", () => {
  it("runs pytest as a module over the given files", () => {
    expect(buildPythonTestCommand({ files: ["test_a.py", "b_test.py"] })).toBe(
      "python -m pytest test_a.py b_test.py",
    );
  });

  it("adds the json report flags ahead of extra arguments", () => {
    expect(
      buildPythonTestCommand({
        files: ["test_a.py"],
        jsonReport: true,
        args: ["-v"],
      }),
    ).toBe(
      "python -m pytest test_a.py --json-report --json-report-file=/dev/stdout -v",
    );
  });
});

describe("execInSandbox", () => {
  it("runs the command through the provider against the handle", async () => {
    const { provider, exec } = createProvider();

    await expect(
      execInSandbox({ sandbox: handle, provider }, "ls", { cwd: "/code" }),
    ).resolves.toBe(OK);

    expect(exec).toHaveBeenCalledWith(handle, "ls", { cwd: "/code" });
  });
});

describe("python runners", () => {
  it("passes only the exec options through to the provider", async () => {
    const { provider, exec } = createProvider();
    const target = { sandbox: handle, provider };

    await installPythonPackages(target, { timeoutSec: 60 });
    await runPythonTests(target, { files: ["test_x.py"], args: ["-v"], timeoutSec: 60 });

    expect(exec.mock.calls.map((call) => call[1])).toEqual([
      "python -m pip install --quiet pytest pytest-json-report",
      "python -m pytest test_x.py -v",
    ]);
    expect(exec.mock.calls[0][2]).toEqual({ timeoutSec: 60 });
    expect(exec.mock.calls[1][2]).toEqual({
      cwd: undefined,
      env: undefined,
      timeoutSec: 60,
    });
  });
});
