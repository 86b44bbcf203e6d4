import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { loadConfigFile, parseConfigFile, resolveConfig, type ConfigFile } from "../src/config/config.js";
import { ConfigError } from "../src/core/errors.js";
import { DEFAULT_INSTALLER_URL } from "../src/env/builder.js";
import type { InstanceContext } from "../src/execution/slurm/jobContext.js";

const INSTANCE: InstanceContext = {
  instanceId: "inst_TEST",
  jobId: "4242",
  arrayJobId: null,
  arrayTaskId: null,
  restartCount: 0,
  account: null,
  submitDir: "/home/alice/run",
  user: "alice",
  defaultScratchDir: "/scratch/alice/job_4242"
};

describe("config", () => {
  it("applies defaults from the scheduler context", () => {
    const cfg = resolveConfig({ file: null, env: {}, overrides: { specPath: "env.yaml" }, instance: INSTANCE });
    expect(cfg).toEqual({
      specPath: "/home/alice/run/env.yaml",
      cacheDir: "/home/alice/run",
      scratchDir: "/scratch/alice/job_4242",
      restoreFailure: "fail_closed",
      logLevel: "info",
      databaseUrl: null,
      autoSchema: true,
      installer: { url: DEFAULT_INSTALLER_URL, useMamba: true, channels: ["conda-forge"] }
    });
  });

  it("layers file, environment and flags", () => {
    const file: ConfigFile = {
      version: 1,
      spec_path: "from-file.yaml",
      cache_dir: "/shared/cache",
      restore_failure: "rebuild",
      log_level: "warn",
      database_url: "postgres://file/db"
    };
    const cfg = resolveConfig({
      file,
      env: { ENVPROV_SPEC: "from-env.yaml", ENVPROV_LOG_LEVEL: "debug", DATABASE_URL: "postgres://env/db" },
      overrides: { restoreFailure: "fail_closed" },
      instance: INSTANCE
    });
    expect(cfg.specPath).toBe("/home/alice/run/from-env.yaml");
    expect(cfg.cacheDir).toBe("/shared/cache");
    expect(cfg.restoreFailure).toBe("fail_closed");
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.databaseUrl).toBe("postgres://env/db");
  });

  it("resolves ledger schema bootstrapping from file and environment", () => {
    const base = { overrides: { specPath: "e.yaml" }, instance: INSTANCE };
    expect(resolveConfig({ ...base, file: { version: 1, auto_schema: false }, env: {} }).autoSchema).toBe(false);
    expect(resolveConfig({ ...base, file: { version: 1, auto_schema: false }, env: { ENVPROV_AUTO_SCHEMA: "true" } }).autoSchema).toBe(
      true
    );
    expect(resolveConfig({ ...base, file: null, env: { ENVPROV_AUTO_SCHEMA: "FALSE" } }).autoSchema).toBe(false);
    expect(() => resolveConfig({ ...base, file: null, env: { ENVPROV_AUTO_SCHEMA: "maybe" } })).toThrow(
      "ENVPROV_AUTO_SCHEMA must be true or false, got maybe"
    );
  });

  it("requires a spec", () => {
    expect(() => resolveConfig({ file: null, env: {}, overrides: {}, instance: INSTANCE })).toThrow(
      "no environment spec given (--spec, ENVPROV_SPEC or spec_path)"
    );
  });

  it("rejects unknown policies and levels", () => {
    expect(() =>
      resolveConfig({ file: null, env: { ENVPROV_RESTORE_FAILURE: "retry" }, overrides: { specPath: "e.yaml" }, instance: INSTANCE })
    ).toThrow("ENVPROV_RESTORE_FAILURE must be fail_closed or rebuild, got retry");
    expect(() =>
      resolveConfig({ file: null, env: {}, overrides: { specPath: "e.yaml", logLevel: "trace" }, instance: INSTANCE })
    ).toThrow("--log-level must be debug, info, warn or error, got trace");
  });

  it("expands environment references in the config file", () => {
    const file = parseConfigFile("version: 1\ncache_dir: ${PROJECT_DIR}/cache\ninstaller:\n  use_mamba: false\n", {
      PROJECT_DIR: "/projappl/proj01"
    });
    expect(file.cache_dir).toBe("/projappl/proj01/cache");
    expect(file.installer?.use_mamba).toBe(false);
    expect(() => parseConfigFile("version: 1\ncache_dir: ${NOPE}/cache\n", {})).toThrow(
      "config references unset environment variable NOPE"
    );
  });

  it("reports schema problems as config errors", () => {
    expect(() => parseConfigFile("version: 2\n", {}, "envprov.yaml")).toThrow(ConfigError);
    expect(() => parseConfigFile("version: 1\ninstaller:\n  url: not a url\n", {}, "envprov.yaml")).toThrow(
      /^envprov\.yaml is invalid:/
    );
  });

  it("loads a config file from disk", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "envprov-cfg-"));
    const p = path.join(dir, "envprov.yaml");
    await writeFile(p, "version: 1\nspec_path: env.yaml\nscratch_dir: /tmp/scratch\n", "utf8");
    expect(await loadConfigFile(p, {})).toEqual({ version: 1, spec_path: "env.yaml", scratch_dir: "/tmp/scratch" });

    const err = await loadConfigFile(path.join(dir, "missing.yaml"), {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
  });
});
