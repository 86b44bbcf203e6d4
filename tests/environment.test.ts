import { describe, it, expect } from "vitest";
import path from "path";
import { sha256Digest } from "../src/core/digest.js";
import { activationEnv } from "../src/env/environment.js";

describe("activationEnv", () => {
  it("puts the environment first on PATH and drops PYTHONHOME", () => {
    const env = activationEnv(
      { name: "analysis", prefix: "/scratch/envs/analysis", fingerprint: sha256Digest("spec"), origin: "restored" },
      { PATH: "/usr/bin", PYTHONHOME: "/opt/python", HOME: "/home/alice" }
    );
    expect(env).toEqual({
      PATH: `/scratch/envs/analysis/bin${path.delimiter}/usr/bin`,
      HOME: "/home/alice",
      CONDA_PREFIX: "/scratch/envs/analysis",
      CONDA_DEFAULT_ENV: "analysis",
      CONDA_SHLVL: "1"
    });
  });

  it("uses the environment's bin alone when the base has no PATH", () => {
    const env = activationEnv(
      { name: "analysis", prefix: "/scratch/envs/analysis", fingerprint: sha256Digest("spec"), origin: "built" },
      {}
    );
    expect(env.PATH).toBe("/scratch/envs/analysis/bin");
  });
});
