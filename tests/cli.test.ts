import { describe, it, expect } from "vitest";
import { parseArgs, stringFlag } from "../src/cli/args.js";

describe("parseArgs", () => {
  it("reads flags and passes the workload through", () => {
    const args = parseArgs(["--spec", "env.yaml", "--log-level=debug", "--json", "--", "python", "--epochs", "5"]);
    expect(args).toEqual({
      flags: { spec: "env.yaml", "log-level": "debug", json: true },
      rest: ["python", "--epochs", "5"]
    });
    expect(stringFlag(args, "spec")).toBe("env.yaml");
    expect(stringFlag(args, "json")).toBeUndefined();
  });

  it("rejects stray positionals and missing values", () => {
    expect(() => parseArgs(["python"])).toThrow("unexpected arg: python");
    expect(() => parseArgs(["--spec"])).toThrow("missing value for --spec");
    expect(() => parseArgs(["--spec", "--json"])).toThrow("missing value for --spec");
  });
});
