import { describe, it, expect } from "vitest";
import { LocalCommandRunner, tailLines } from "../src/execution/commandRunner.js";

describe("LocalCommandRunner", () => {
  it("captures output and exit status", async () => {
    const res = await new LocalCommandRunner().run({
      argv: [process.execPath, "-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"]
    });
    expect(res.exitCode).toBe(3);
    expect(res.stdout).toBe("out");
    expect(res.stderr).toBe("err");
  });

  it("reports a signalled command the way a shell does", async () => {
    const res = await new LocalCommandRunner().run({
      argv: [process.execPath, "-e", "process.kill(process.pid, 'SIGTERM')"]
    });
    expect(res.exitCode).toBe(143);
  });

  it("merges the given environment over the parent's", async () => {
    const res = await new LocalCommandRunner().run({
      argv: [process.execPath, "-e", "process.stdout.write(process.env.ENVPROV_TEST_VALUE ?? '')"],
      env: { ENVPROV_TEST_VALUE: "placeholder" }
    });
    expect(res.stdout).toBe("placeholder");
  });

  it("keeps only the tail of very large output", async () => {
    const res = await new LocalCommandRunner().run({
      argv: [process.execPath, "-e", "process.stdout.write('x'.repeat(1024 * 1024 + 10) + 'END')"]
    });
    expect(res.stdout.startsWith("[stdout truncated]\n")).toBe(true);
    expect(res.stdout.endsWith("END")).toBe(true);
    expect(res.stdout.length).toBe("[stdout truncated]\n".length + 1024 * 1024);
  });

  it("rejects when the program cannot be started", async () => {
    await expect(new LocalCommandRunner().run({ argv: ["/nonexistent/envprov-test-binary"] })).rejects.toMatchObject({
      code: "ENOENT"
    });
  });
});

describe("tailLines", () => {
  it("keeps the last lines without trailing blank ones", () => {
    expect(tailLines("a\nb\nc\n\n", 2)).toBe("b\nc");
    expect(tailLines("one\r\ntwo")).toBe("one\ntwo");
  });
});
