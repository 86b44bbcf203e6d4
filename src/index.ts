#!/usr/bin/env node
import { promises as fs } from "fs";
import path from "path";
import { LocalCacheStore } from "./cache/localCacheStore.js";
import { parseArgs, stringFlag } from "./cli/args.js";
import { loadConfigFile, resolveConfig, type ProvisionerConfig } from "./config/config.js";
import { stableJsonStringify } from "./core/canonicalJson.js";
import { describeError } from "./core/errors.js";
import { createLogger, type Logger } from "./core/logger.js";
import { applySchema } from "./db/bootstrap.js";
import { createDb, createPgPool } from "./db/connection.js";
import { CondaInstaller, EnvironmentBuilder } from "./env/builder.js";
import { activationEnv } from "./env/environment.js";
import { CondaPacker, EnvironmentPacker } from "./env/packer.js";
import { EnvironmentUnpacker } from "./env/unpacker.js";
import { LocalCommandRunner, type CommandRunner } from "./execution/commandRunner.js";
import { resolveInstanceContext, type InstanceContext } from "./execution/slurm/jobContext.js";
import { describeJobScript } from "./execution/slurm/jobScript.js";
import { runWorkload } from "./execution/workloadRunner.js";
import { EnvironmentProvisioner, type ProvisionResult } from "./provision/provisioner.js";
import { SpecFingerprinter } from "./spec/fingerprint.js";
import { PostgresLedgerStore, ledgerInputFromResult } from "./store/ledgerStore.js";

// Exit status when no workload was started because provisioning failed.
const EXIT_PROVISION_FAILED = 70;

function usage(): string {
  return [
    "usage:",
    "  envprov [run] [--config <file>] [--spec <environment.yaml>] [--cache-dir <dir>]",
    "          [--scratch-dir <dir>] [--restore-failure fail_closed|rebuild] [--log-level <level>]",
    "          [-- <workload argv...>]",
    "",
    "Provisions the environment through the shared cache, then execs the workload inside it.",
    "Without a workload, prints the activation environment as JSON on stdout.",
    ""
  ].join("\n");
}

function createProvisioner(
  config: ProvisionerConfig,
  instance: InstanceContext,
  runner: CommandRunner,
  logger: Logger
): EnvironmentProvisioner {
  const condaRoot = path.join(config.scratchDir, "miniconda3");
  const cache = new LocalCacheStore(config.cacheDir, { logger });
  return new EnvironmentProvisioner({
    fingerprinter: new SpecFingerprinter(),
    cache,
    builder: new EnvironmentBuilder({
      installer: new CondaInstaller({
        runner,
        condaRoot,
        installerUrl: config.installer.url,
        useMamba: config.installer.useMamba,
        solverChannels: config.installer.channels,
        logger
      }),
      scratchDir: config.scratchDir,
      logger
    }),
    packer: new EnvironmentPacker({
      packer: new CondaPacker({ runner, condaRoot, outDir: config.scratchDir, channels: config.installer.channels }),
      cache,
      instanceId: instance.instanceId,
      logger
    }),
    unpacker: new EnvironmentUnpacker({ runner, logger }),
    restoreFailure: config.restoreFailure,
    logger
  });
}

async function recordLedger(
  config: ProvisionerConfig,
  logger: Logger,
  input: Parameters<typeof ledgerInputFromResult>[0]
): Promise<void> {
  if (!config.databaseUrl) return;
  const pool = createPgPool(config.databaseUrl);
  const db = createDb(pool);
  try {
    if (config.autoSchema) await applySchema(pool);
    const entry = await new PostgresLedgerStore(db).record(ledgerInputFromResult(input));
    logger.debug("ledger entry recorded", { provision_id: entry.provisionId });
  } catch (err) {
    logger.warn("recording the provisioning ledger failed", { error: describeError(err) });
  } finally {
    await db.destroy();
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv[0] === "run") argv.shift();
  const args = parseArgs(argv);
  if (args.flags.help) {
    process.stdout.write(usage());
    return;
  }

  const instance = resolveInstanceContext(process.env);
  const configPath = stringFlag(args, "config") ?? process.env.ENVPROV_CONFIG;
  const file = configPath ? await loadConfigFile(configPath) : null;
  const config = resolveConfig({
    file,
    env: process.env,
    overrides: {
      specPath: stringFlag(args, "spec"),
      cacheDir: stringFlag(args, "cache-dir"),
      scratchDir: stringFlag(args, "scratch-dir"),
      restoreFailure: stringFlag(args, "restore-failure"),
      logLevel: stringFlag(args, "log-level")
    },
    instance
  });

  const logger = createLogger({ level: config.logLevel }).child({ instance_id: instance.instanceId });
  const runner = new LocalCommandRunner();

  let jobScriptSha256: string | null = null;
  if (instance.jobId) {
    const script = await describeJobScript(instance.jobId, runner);
    for (const w of script.warnings) logger.warn("job script metadata unavailable", { reason: w });
    if (script.info) {
      jobScriptSha256 = script.info.sha256;
      logger.info("job metadata", {
        slurm_job_id: instance.jobId,
        slurm_array_job_id: instance.arrayJobId,
        slurm_array_task_id: instance.arrayTaskId,
        job_script: script.info.path,
        job_script_md5: script.info.md5,
        job_script_sha256: script.info.sha256,
        job_script_lines: script.info.lineCount
      });
    }
  }

  logger.info("provisioning", {
    spec_path: config.specPath,
    cache_dir: config.cacheDir,
    scratch_dir: config.scratchDir,
    restore_failure: config.restoreFailure
  });

  await fs.mkdir(config.scratchDir, { recursive: true });
  const startedAt = new Date().toISOString();
  const result: ProvisionResult = await createProvisioner(config, instance, runner, logger).provision({
    specPath: config.specPath,
    instanceId: instance.instanceId,
    scratchDir: config.scratchDir
  });
  await recordLedger(config, logger, {
    result,
    instance,
    specPath: config.specPath,
    jobScriptSha256,
    startedAt,
    finishedAt: new Date().toISOString()
  });

  if (result.status === "failed") {
    process.exitCode = EXIT_PROVISION_FAILED;
    return;
  }

  const env = activationEnv(result.environment);
  if (args.rest.length === 0) {
    const doc = {
      status: result.status,
      path: result.path,
      spec_name: result.specName,
      fingerprint: result.fingerprint,
      prefix: result.environment.prefix,
      warnings: result.warnings,
      env: {
        PATH: env.PATH,
        CONDA_PREFIX: env.CONDA_PREFIX,
        CONDA_DEFAULT_ENV: env.CONDA_DEFAULT_ENV
      }
    };
    process.stdout.write(`${stableJsonStringify(doc, 2)}\n`);
    return;
  }

  logger.info("starting workload", { argv: args.rest, cwd: instance.submitDir });
  process.exitCode = await runWorkload(args.rest, { env, cwd: instance.submitDir });
}

main().catch((err) => {
  console.error(stableJsonStringify({ level: "error", msg: "envprov failed", error: describeError(err) }));
  process.exitCode = 1;
});
