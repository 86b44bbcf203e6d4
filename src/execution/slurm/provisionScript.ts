import * as z from "zod/v4";
import type { RestoreFailurePolicy } from "../../provision/provisioner.js";

const SlurmTokenSchema = z.string().regex(/^[A-Za-z0-9_.:,+-]+$/, "must be a plain Slurm token");

export const ProvisionJobSpecSchema = z.object({
  version: z.literal(1),
  job_name: SlurmTokenSchema,
  placement: z.object({
    account: SlurmTokenSchema,
    partition: SlurmTokenSchema,
    clusters: SlurmTokenSchema.optional(),
    qos: SlurmTokenSchema.optional()
  }),
  resources: z.object({
    time_limit_seconds: z.number().int().min(1),
    nodes: z.number().int().min(1).default(1),
    ntasks: z.number().int().min(1).default(1),
    cpus_per_task: z.number().int().min(1).optional(),
    mem_mb: z.number().int().min(1),
    gpus: z.number().int().min(0).optional()
  }),
  array: z
    .object({
      first: z.number().int().min(0),
      last: z.number().int().min(0),
      max_concurrent: z.number().int().min(1).optional()
    })
    .refine((a) => a.last >= a.first, "array.last must not be below array.first")
    .optional(),
  environment: z.object({
    spec_path: z.string().min(1),
    cache_dir: z.string().min(1).optional(),
    restore_failure: z.enum(["fail_closed", "rebuild"]).optional()
  }),
  workload: z.object({
    argv: z.array(z.string()).min(1),
    workdir: z.string().optional(),
    env: z.record(z.string(), z.string()).default({})
  }),
  envprov_command: z.string().min(1).default("envprov")
});

export type ProvisionJobSpec = z.infer<typeof ProvisionJobSpecSchema>;

function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function formatSlurmTimeLimit(seconds: number): string {
  if (!Number.isInteger(seconds) || seconds < 1) throw new Error(`invalid time_limit_seconds: ${seconds}`);

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const hms = [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
  return days > 0 ? `${days}-${hms}` : hms;
}

function assertEnvKey(key: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    throw new Error(`invalid env var name: ${key}`);
  }
}

/**
 * Renders a batch script for a job array whose every task provisions its environment through the
 * cache and then execs the workload inside it.
 */
export function renderProvisionScript(spec: ProvisionJobSpec): string {
  const lines: string[] = ["#!/usr/bin/env bash", ""];
  const directive = (flag: string, value: string | number): void => {
    lines.push(`#SBATCH --${flag}=${value}`);
  };

  directive("job-name", spec.job_name);
  directive("account", spec.placement.account);
  if (spec.placement.clusters) directive("clusters", spec.placement.clusters);
  directive("partition", spec.placement.partition);
  if (spec.placement.qos) directive("qos", spec.placement.qos);
  if (spec.resources.gpus !== undefined && spec.resources.gpus > 0) directive("gpus", spec.resources.gpus);
  directive("mem", `${spec.resources.mem_mb}M`);
  directive("time", formatSlurmTimeLimit(spec.resources.time_limit_seconds));
  directive("output", spec.array ? "%x.o%A.%a.%N" : "%x.o%j.%N");
  directive("nodes", spec.resources.nodes);
  if (spec.array) {
    const range = `${spec.array.first}-${spec.array.last}`;
    directive("array", spec.array.max_concurrent ? `${range}%${spec.array.max_concurrent}` : range);
  }
  directive("ntasks", spec.resources.ntasks);
  if (spec.resources.cpus_per_task !== undefined) directive("cpus-per-task", spec.resources.cpus_per_task);

  lines.push("", "set -euo pipefail", "");
  lines.push(`export ENVPROV_SPEC=${bashSingleQuote(spec.environment.spec_path)}`);
  if (spec.environment.cache_dir) lines.push(`export ENVPROV_CACHE_DIR=${bashSingleQuote(spec.environment.cache_dir)}`);
  const policy: RestoreFailurePolicy | undefined = spec.environment.restore_failure;
  if (policy) lines.push(`export ENVPROV_RESTORE_FAILURE=${policy}`);

  const envKeys = Object.keys(spec.workload.env).sort();
  for (const k of envKeys) {
    assertEnvKey(k);
    lines.push(`export ${k}=${bashSingleQuote(spec.workload.env[k] ?? "")}`);
  }
  lines.push("");

  if (spec.workload.workdir) lines.push(`cd ${bashSingleQuote(spec.workload.workdir)}`);
  const argv = [spec.envprov_command, "run", "--", ...spec.workload.argv];
  lines.push(`exec ${argv.map((a) => bashSingleQuote(a)).join(" ")}`);
  lines.push("");

  return lines.join("\n");
}
