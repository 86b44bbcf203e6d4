import path from "path";
import { CacheMissError, describeError, toProvisionError, type ProvisionError, type ProvisionStage } from "../core/errors.js";
import type { InstanceId } from "../core/ids.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { CacheKey, CacheStore } from "../cache/cacheStore.js";
import type { Builder } from "../env/builder.js";
import type { MaterializedEnvironment } from "../env/environment.js";
import type { EnvironmentPacker } from "../env/packer.js";
import type { Unpacker } from "../env/unpacker.js";
import { parseEnvironmentSpec, type EnvironmentSpec } from "../spec/environmentSpec.js";
import type { Fingerprint, SpecFingerprinter } from "../spec/fingerprint.js";
import { ProvisionStateMachine, type ProvisionState, type TransitionRecord } from "./stateMachine.js";

/** What to do when a cache hit cannot be restored. */
export type RestoreFailurePolicy = "fail_closed" | "rebuild";

export interface ProvisionRequest {
  specPath: string;
  instanceId: InstanceId;
  /** Instance-local ephemeral storage; everything materialized lands below it. */
  scratchDir: string;
}

export type ProvisionPath = "restore" | "build";

export interface ProvisionReady {
  status: "ready";
  path: ProvisionPath;
  specName: string;
  fingerprint: Fingerprint;
  environment: MaterializedEnvironment;
  /** Non-fatal problems, e.g. a failed cache commit. */
  warnings: string[];
  transitions: TransitionRecord[];
}

export interface ProvisionFailed {
  status: "failed";
  stage: ProvisionStage;
  error: ProvisionError;
  specName: string | null;
  fingerprint: Fingerprint | null;
  warnings: string[];
  transitions: TransitionRecord[];
}

export type ProvisionResult = ProvisionReady | ProvisionFailed;

export interface ProvisionerDeps {
  fingerprinter: SpecFingerprinter;
  cache: CacheStore;
  builder: Builder;
  packer: EnvironmentPacker;
  unpacker: Unpacker;
  restoreFailure?: RestoreFailurePolicy;
  logger?: Logger;
  clock?: () => Date;
}

export function restoredPrefix(scratchDir: string, specName: string): string {
  return path.join(scratchDir, "envs", specName);
}

/**
 * One provisioning pass per job instance:
 *
 *   START -> FINGERPRINT -> CACHE_HIT -> RESTORE ------------> READY
 *                        \-> CACHE_MISS -> BUILD -> PACK ----> READY
 *   any fatal stage -> FAILED
 *
 * Never throws for stage failures; the result carries the typed cause. A workload must only be
 * started on `status: "ready"`.
 */
export class EnvironmentProvisioner {
  private readonly logger: Logger;
  private readonly restoreFailure: RestoreFailurePolicy;

  constructor(private readonly deps: ProvisionerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.restoreFailure = deps.restoreFailure ?? "fail_closed";
  }

  async provision(request: ProvisionRequest): Promise<ProvisionResult> {
    const machine = new ProvisionStateMachine(this.deps.clock);
    const warnings: string[] = [];
    let log = this.logger.child({ instance_id: request.instanceId });

    const step = (to: ProvisionState, note?: string): void => {
      machine.transition(to, note);
      log.debug("provisioning transition", { state: to, ...(note ? { note } : {}) });
    };

    const fail = (
      stage: ProvisionStage,
      err: unknown,
      spec: { name: string; fingerprint: Fingerprint } | null
    ): ProvisionFailed => {
      const error = toProvisionError(stage, err);
      step("FAILED", error.code);
      log.error("provisioning failed", { error: describeError(error) });
      return {
        status: "failed",
        stage,
        error,
        specName: spec?.name ?? null,
        fingerprint: spec?.fingerprint ?? null,
        warnings,
        transitions: machine.history
      };
    };

    step("FINGERPRINT");
    let spec: EnvironmentSpec;
    let fingerprint: Fingerprint;
    try {
      const read = await this.deps.fingerprinter.fingerprintFile(request.specPath);
      fingerprint = read.fingerprint;
      spec = parseEnvironmentSpec(read.bytes, request.specPath);
    } catch (err) {
      return fail("fingerprint", err, null);
    }

    const key: CacheKey = { specName: spec.name, fingerprint };
    const ident = { name: spec.name, fingerprint };
    log = log.child({ spec_name: spec.name, fingerprint });

    let hit: boolean;
    try {
      hit = await this.deps.cache.has(key);
    } catch (err) {
      return fail("lookup", err, ident);
    }

    if (hit) {
      step("CACHE_HIT");
      step("RESTORE");
      log.info("cache hit; restoring environment");
      try {
        const blob = await this.deps.cache.fetch(key, request.scratchDir);
        const environment = await this.deps.unpacker.unpack(blob, restoredPrefix(request.scratchDir, spec.name), ident);
        step("READY");
        log.info("environment ready", { path: "restore", prefix: environment.prefix });
        return { status: "ready", path: "restore", specName: spec.name, fingerprint, environment, warnings, transitions: machine.history };
      } catch (err) {
        if (err instanceof CacheMissError) {
          log.info("cache record changed during restore; building instead", { reason: err.message });
        } else if (this.restoreFailure === "rebuild") {
          const error = toProvisionError("restore", err);
          warnings.push(`restore failed (${error.code}): ${error.message}; rebuilt from spec`);
          log.warn("restore failed; rebuilding under restore_failure=rebuild", { error: describeError(error) });
        } else {
          return fail("restore", err, ident);
        }
      }
    } else {
      step("CACHE_MISS");
      log.info("cache miss; building environment");
    }

    step("BUILD");
    let environment: MaterializedEnvironment;
    try {
      environment = await this.deps.builder.build(spec, fingerprint);
    } catch (err) {
      return fail("build", err, ident);
    }

    step("PACK");
    const outcome = await this.deps.packer.packAndCommit(key, environment);
    if (!outcome.committed) warnings.push(outcome.error.message);

    step("READY");
    log.info("environment ready", { path: "build", prefix: environment.prefix, cached: outcome.committed });
    return { status: "ready", path: "build", specName: spec.name, fingerprint, environment, warnings, transitions: machine.history };
  }
}
