import type { Insertable, Kysely, Selectable } from "kysely";
import { describeError } from "../core/errors.js";
import { newProvisionId, type InstanceId, type ProvisionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { DB } from "../db/types.js";
import type { InstanceContext } from "../execution/slurm/jobContext.js";
import type { ProvisionResult } from "../provision/provisioner.js";
import type { TransitionRecord } from "../provision/stateMachine.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return new Date(value).toISOString();
  return new Date(String(value)).toISOString();
}

export interface ProvisionLedgerInput {
  instanceId: InstanceId;
  slurmJobId: string | null;
  slurmArrayJobId: string | null;
  slurmArrayTaskId: string | null;
  specPath: string;
  specName: string | null;
  fingerprint: string | null;
  status: ProvisionResult["status"];
  path: "restore" | "build" | null;
  errorCode: string | null;
  errorStage: string | null;
  errorMessage: string | null;
  envPrefix: string | null;
  jobScriptSha256: string | null;
  details: JsonObject;
  transitions: TransitionRecord[];
  startedAt: string;
  finishedAt: string;
}

export interface ProvisionLedgerEntry extends Omit<ProvisionLedgerInput, "transitions"> {
  provisionId: ProvisionId;
  createdAt: string;
}

export interface ProvisionEvent {
  seq: number;
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

/** Where each provisioning pass is recorded; optional, the cache works without it. */
export interface ProvisionLedger {
  record(input: ProvisionLedgerInput): Promise<ProvisionLedgerEntry>;
}

export function ledgerInputFromResult(input: {
  result: ProvisionResult;
  instance: InstanceContext;
  specPath: string;
  jobScriptSha256: string | null;
  startedAt: string;
  finishedAt: string;
}): ProvisionLedgerInput {
  const { result, instance } = input;
  const failed = result.status === "failed" ? result : null;
  const ready = result.status === "ready" ? result : null;

  const details: JsonObject = { warnings: result.warnings };
  if (failed) details.error = describeError(failed.error);

  return {
    instanceId: instance.instanceId,
    slurmJobId: instance.jobId,
    slurmArrayJobId: instance.arrayJobId,
    slurmArrayTaskId: instance.arrayTaskId,
    specPath: input.specPath,
    specName: result.specName,
    fingerprint: result.fingerprint,
    status: result.status,
    path: ready ? ready.path : null,
    errorCode: failed ? failed.error.code : null,
    errorStage: failed ? failed.stage : null,
    errorMessage: failed ? failed.error.message : null,
    envPrefix: ready ? ready.environment.prefix : null,
    jobScriptSha256: input.jobScriptSha256,
    details,
    transitions: result.transitions,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt
  };
}

export class PostgresLedgerStore implements ProvisionLedger {
  constructor(private readonly db: Kysely<DB>) {}

  async record(input: ProvisionLedgerInput): Promise<ProvisionLedgerEntry> {
    const provisionId = newProvisionId();

    await this.db.transaction().execute(async (trx) => {
      await trx
        .insertInto("provision_instances")
        .values({
          provision_id: provisionId,
          instance_id: input.instanceId,
          slurm_job_id: input.slurmJobId,
          slurm_array_job_id: input.slurmArrayJobId,
          slurm_array_task_id: input.slurmArrayTaskId,
          spec_path: input.specPath,
          spec_name: input.specName,
          fingerprint: input.fingerprint,
          status: input.status,
          path: input.path,
          error_code: input.errorCode,
          error_stage: input.errorStage,
          error_message: input.errorMessage,
          env_prefix: input.envPrefix,
          job_script_sha256: input.jobScriptSha256,
          details: input.details,
          started_at: input.startedAt,
          finished_at: input.finishedAt
        })
        .execute();

      if (input.transitions.length > 0) {
        await trx
          .insertInto("provision_events")
          .values(
            input.transitions.map((t, seq): Insertable<DB["provision_events"]> => ({
              provision_id: provisionId,
              seq,
              ts: t.at,
              kind: "transition",
              message: `${t.from} -> ${t.to}`,
              data: t.note ? { from: t.from, to: t.to, note: t.note } : { from: t.from, to: t.to }
            }))
          )
          .execute();
      }
    });

    const entry = await this.getProvision(provisionId);
    if (!entry) throw new Error(`ledger row ${provisionId} vanished after insert`);
    return entry;
  }

  async getProvision(provisionId: ProvisionId): Promise<ProvisionLedgerEntry | null> {
    const row = await this.db
      .selectFrom("provision_instances")
      .selectAll()
      .where("provision_id", "=", provisionId)
      .executeTakeFirst();
    return row ? this.mapEntry(row) : null;
  }

  async listByFingerprint(fingerprint: string, limit = 100): Promise<ProvisionLedgerEntry[]> {
    const rows = await this.db
      .selectFrom("provision_instances")
      .selectAll()
      .where("fingerprint", "=", fingerprint)
      .orderBy("started_at", "asc")
      .orderBy("provision_id", "asc")
      .limit(limit)
      .execute();
    return rows.map((row) => this.mapEntry(row));
  }

  async listEvents(provisionId: ProvisionId): Promise<ProvisionEvent[]> {
    const rows = await this.db
      .selectFrom("provision_events")
      .selectAll()
      .where("provision_id", "=", provisionId)
      .orderBy("seq", "asc")
      .execute();
    return rows.map((r) => ({
      seq: r.seq,
      ts: toIso(r.ts),
      kind: r.kind,
      message: r.message,
      data: r.data ?? null
    }));
  }

  private mapEntry(row: Selectable<DB["provision_instances"]>): ProvisionLedgerEntry {
    return {
      provisionId: row.provision_id,
      instanceId: row.instance_id,
      slurmJobId: row.slurm_job_id,
      slurmArrayJobId: row.slurm_array_job_id,
      slurmArrayTaskId: row.slurm_array_task_id,
      specPath: row.spec_path,
      specName: row.spec_name,
      fingerprint: row.fingerprint,
      status: row.status === "ready" ? "ready" : "failed",
      path: row.path === "restore" || row.path === "build" ? row.path : null,
      errorCode: row.error_code,
      errorStage: row.error_stage,
      errorMessage: row.error_message,
      envPrefix: row.env_prefix,
      jobScriptSha256: row.job_script_sha256,
      details: row.details,
      startedAt: toIso(row.started_at),
      finishedAt: toIso(row.finished_at),
      createdAt: toIso(row.created_at)
    };
  }
}
