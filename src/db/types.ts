import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { InstanceId, ProvisionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
// pg hands timestamptz back as Date; inserts use ISO strings.
type Timestamp = ColumnType<Date | string, string, string>;

export interface ProvisionInstancesTable {
  provision_id: ProvisionId;
  instance_id: InstanceId;
  slurm_job_id: OptionalNullable<string>;
  slurm_array_job_id: OptionalNullable<string>;
  slurm_array_task_id: OptionalNullable<string>;
  spec_path: string;
  spec_name: OptionalNullable<string>;
  fingerprint: OptionalNullable<string>;
  status: string;
  path: OptionalNullable<string>;
  error_code: OptionalNullable<string>;
  error_stage: OptionalNullable<string>;
  error_message: OptionalNullable<string>;
  env_prefix: OptionalNullable<string>;
  job_script_sha256: OptionalNullable<string>;
  details: JSONColumnType<JsonObject, JsonObject, JsonObject>;
  started_at: Timestamp;
  finished_at: Timestamp;
  created_at: Generated<Date | string>;
}

export interface ProvisionEventsTable {
  provision_id: ProvisionId;
  seq: number;
  ts: Timestamp;
  kind: string;
  message: OptionalNullable<string>;
  data: JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
}

export interface DB {
  provision_instances: ProvisionInstancesTable;
  provision_events: ProvisionEventsTable;
}
