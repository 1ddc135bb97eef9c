import { describe, expect, it, jest } from "@jest/globals";
import { SandboxLease } from "../sessions/sandbox-lease.js";
import { FakeSandboxProvider } from "./helpers/fake-provider.js";

describe("SandboxLease", () => {
  it("stops and removes the sandbox exactly once across concurrent releases", async () => {
    const provider = new FakeSandboxProvider();
    const sandbox = await provider.createSandbox({ image: "python", command: ["sleep"] });
    const lease = new SandboxLease(sandbox, "pool", provider);

    const results = await Promise.all([lease.release(), lease.release(), lease.release()]);

    expect(results).toEqual([true, false, false]);
    expect(provider.stopped).toEqual(["sandbox-1"]);
    expect(provider.deleted).toEqual(["sandbox-1"]);
    expect(lease.isReleased).toBe(true);
  });

  it("still removes the sandbox and staging area when stopping fails", async () => {
    const provider = new FakeSandboxProvider();
    const sandbox = await provider.createSandbox({ image: "python", command: ["sleep"] });
    const dispose = jest.fn(async () => undefined);
    const lease = new SandboxLease(sandbox, "fresh", provider, {
      path: "/tmp/session-x",
      dispose,
    });
    provider.failOn("stop", new Error("daemon unavailable"));

    await expect(lease.release()).rejects.toThrow("daemon unavailable");

    expect(provider.deleted).toEqual(["sandbox-1"]);
    expect(dispose).toHaveBeenCalledTimes(1);
    await expect(lease.release()).resolves.toBe(false);
  });

  it("reports the first failure when both stop and remove fail", async () => {
    const provider = new FakeSandboxProvider();
    const sandbox = await provider.createSandbox({ image: "python", command: ["sleep"] });
    const lease = new SandboxLease(sandbox, "pool", provider);
    provider.failOn("stop", new Error("stop failed"));
    provider.failOn("delete", new Error("remove failed"));

    await expect(lease.release()).rejects.toThrow("stop failed");
  });
});
