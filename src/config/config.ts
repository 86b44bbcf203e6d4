import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigError, errorMessage } from "../core/errors.js";
import { isLogLevel, type LogLevel } from "../core/logger.js";
import { DEFAULT_INSTALLER_URL } from "../env/builder.js";
import type { InstanceContext } from "../execution/slurm/jobContext.js";
import type { RestoreFailurePolicy } from "../provision/provisioner.js";

const RestoreFailureSchema = z.enum(["fail_closed", "rebuild"]);

export const ConfigFileSchema = z.object({
  version: z.literal(1),
  spec_path: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
  scratch_dir: z.string().min(1).optional(),
  restore_failure: RestoreFailureSchema.optional(),
  log_level: z.enum(["debug", "info", "warn", "error"]).optional(),
  database_url: z.string().min(1).optional(),
  auto_schema: z.boolean().optional(),
  installer: z
    .object({
      url: z.url().optional(),
      use_mamba: z.boolean().optional(),
      channels: z.array(z.string().min(1)).optional()
    })
    .optional()
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Everything a provisioning pass needs, resolved once and passed in explicitly. */
export interface ProvisionerConfig {
  specPath: string;
  cacheDir: string;
  scratchDir: string;
  restoreFailure: RestoreFailurePolicy;
  logLevel: LogLevel;
  databaseUrl: string | null;
  /** Apply db/schema.sql before recording the ledger. */
  autoSchema: boolean;
  installer: {
    url: string;
    useMamba: boolean;
    channels: string[];
  };
}

export interface ConfigOverrides {
  specPath?: string;
  cacheDir?: string;
  scratchDir?: string;
  restoreFailure?: string;
  logLevel?: string;
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function expandEnvRefs(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_REF, (_match, name: string) => {
    const v = env[name]?.trim();
    if (!v) throw new ConfigError(`config references unset environment variable ${name}`);
    return v;
  });
}

function expandDeep(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") return expandEnvRefs(value, env);
  if (Array.isArray(value)) return value.map((v) => expandDeep(v, env));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandDeep(v, env);
    return out;
  }
  return value;
}

export function parseConfigFile(text: string, env: NodeJS.ProcessEnv = process.env, source = "config"): ConfigFile {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`${source} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ConfigFileSchema.safeParse(expandDeep(doc, env));
  if (!parsed.success) throw new ConfigError(`${source} is invalid: ${z.prettifyError(parsed.error)}`);
  return parsed.data;
}

export async function loadConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfigFile(text, env, filePath);
}

function pickRestoreFailure(value: string | undefined, source: string): RestoreFailurePolicy | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = RestoreFailureSchema.safeParse(value);
  if (!parsed.success) throw new ConfigError(`${source} must be fail_closed or rebuild, got ${value}`);
  return parsed.data;
}

function pickLogLevel(value: string | undefined, source: string): LogLevel | undefined {
  if (value === undefined || value === "") return undefined;
  if (!isLogLevel(value)) throw new ConfigError(`${source} must be debug, info, warn or error, got ${value}`);
  return value;
}

function pickBoolean(value: string | undefined, source: string): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  const v = value.toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  throw new ConfigError(`${source} must be true or false, got ${value}`);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Precedence, lowest first: built-in defaults (from the scheduler context), config file,
 * ENVPROV_* environment variables, command-line overrides.
 */
export function resolveConfig(input: {
  file: ConfigFile | null;
  env: NodeJS.ProcessEnv;
  overrides: ConfigOverrides;
  instance: InstanceContext;
}): ProvisionerConfig {
  const { file, env, overrides, instance } = input;

  const specPath = overrides.specPath ?? nonEmpty(env.ENVPROV_SPEC) ?? file?.spec_path;
  if (!specPath) throw new ConfigError("no environment spec given (--spec, ENVPROV_SPEC or spec_path)");

  const cacheDir = overrides.cacheDir ?? nonEmpty(env.ENVPROV_CACHE_DIR) ?? file?.cache_dir ?? instance.submitDir;
  const scratchDir = overrides.scratchDir ?? nonEmpty(env.ENVPROV_SCRATCH_DIR) ?? file?.scratch_dir ?? instance.defaultScratchDir;

  const restoreFailure =
    pickRestoreFailure(overrides.restoreFailure, "--restore-failure") ??
    pickRestoreFailure(nonEmpty(env.ENVPROV_RESTORE_FAILURE), "ENVPROV_RESTORE_FAILURE") ??
    file?.restore_failure ??
    "fail_closed";

  const logLevel =
    pickLogLevel(overrides.logLevel, "--log-level") ??
    pickLogLevel(nonEmpty(env.ENVPROV_LOG_LEVEL), "ENVPROV_LOG_LEVEL") ??
    file?.log_level ??
    "info";

  return {
    specPath: path.resolve(instance.submitDir, specPath),
    cacheDir: path.resolve(instance.submitDir, cacheDir),
    scratchDir: path.resolve(scratchDir),
    restoreFailure,
    logLevel,
    databaseUrl: nonEmpty(env.DATABASE_URL) ?? file?.database_url ?? null,
    autoSchema: pickBoolean(nonEmpty(env.ENVPROV_AUTO_SCHEMA), "ENVPROV_AUTO_SCHEMA") ?? file?.auto_schema ?? true,
    installer: {
      url: file?.installer?.url ?? DEFAULT_INSTALLER_URL,
      useMamba: file?.installer?.use_mamba ?? true,
      channels: file?.installer?.channels ?? ["conda-forge"]
    }
  };
}
