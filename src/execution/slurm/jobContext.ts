import os from "os";
import path from "path";
import { deriveInstanceIdFromParts, newInstanceId, type InstanceId } from "../../core/ids.js";

/** What the batch scheduler tells one job instance about itself. */
export interface InstanceContext {
  instanceId: InstanceId;
  jobId: string | null;
  arrayJobId: string | null;
  arrayTaskId: string | null;
  restartCount: number;
  account: string | null;
  submitDir: string;
  user: string;
  defaultScratchDir: string;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function resolveInstanceContext(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): InstanceContext {
  const jobId = nonEmpty(env.SLURM_JOB_ID);
  const arrayJobId = nonEmpty(env.SLURM_ARRAY_JOB_ID);
  const arrayTaskId = nonEmpty(env.SLURM_ARRAY_TASK_ID);
  const restartCount = Number.parseInt(env.SLURM_RESTART_COUNT ?? "0", 10);
  const user = nonEmpty(env.USER) ?? nonEmpty(env.LOGNAME) ?? "unknown";

  const instanceId = jobId
    ? deriveInstanceIdFromParts([
        `job=${jobId}`,
        `array_job=${arrayJobId ?? ""}`,
        `array_task=${arrayTaskId ?? ""}`,
        `restart=${Number.isInteger(restartCount) ? restartCount : 0}`
      ])
    : newInstanceId();

  return {
    instanceId,
    jobId,
    arrayJobId,
    arrayTaskId,
    restartCount: Number.isInteger(restartCount) ? restartCount : 0,
    account: nonEmpty(env.SLURM_JOB_ACCOUNT),
    submitDir: nonEmpty(env.SLURM_SUBMIT_DIR) ?? cwd,
    user,
    defaultScratchDir: jobId ? path.join("/scratch", user, `job_${jobId}`) : path.join(os.tmpdir(), `envprov-${instanceId}`)
  };
}
