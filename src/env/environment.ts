import path from "path";
import type { Fingerprint } from "../spec/fingerprint.js";

export type EnvironmentOrigin = "restored" | "built";

/** A runnable environment on the instance's own scratch storage. */
export interface MaterializedEnvironment {
  name: string;
  prefix: string;
  fingerprint: Fingerprint;
  origin: EnvironmentOrigin;
}

/**
 * The process environment a workload runs with inside `env`: what `conda activate` would export,
 * without sourcing any shell hooks.
 */
export function activationEnv(env: MaterializedEnvironment, base: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) out[key] = value;
  }
  delete out.PYTHONHOME;

  const bin = path.join(env.prefix, "bin");
  out.PATH = base.PATH ? `${bin}${path.delimiter}${base.PATH}` : bin;
  out.CONDA_PREFIX = env.prefix;
  out.CONDA_DEFAULT_ENV = env.name;
  out.CONDA_SHLVL = "1";
  return out;
}
