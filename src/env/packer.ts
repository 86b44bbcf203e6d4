import { promises as fs } from "fs";
import path from "path";
import { sha256File } from "../core/digest.js";
import { CacheCommitFailedError, errnoCode, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { ArchiveBlob, CacheKey, CacheStore } from "../cache/cacheStore.js";
import type { CacheRecord } from "../cache/record.js";
import { tailLines, type CommandRunner } from "../execution/commandRunner.js";
import type { MaterializedEnvironment } from "./environment.js";

/** Capability that serializes an installed environment into one relocatable archive. */
export interface Packer {
  pack(env: MaterializedEnvironment): Promise<ArchiveBlob>;
}

export interface CondaPackerOptions {
  runner: CommandRunner;
  condaRoot: string;
  outDir: string;
  channels?: string[];
}

export class CondaPacker implements Packer {
  constructor(private readonly options: CondaPackerOptions) {}

  private async ensureCondaPack(): Promise<string> {
    const bin = path.join(this.options.condaRoot, "bin", "conda-pack");
    try {
      await fs.access(bin);
      return bin;
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }

    const channels = (this.options.channels ?? ["conda-forge"]).flatMap((c) => ["-c", c]);
    const res = await this.options.runner.run({
      argv: [path.join(this.options.condaRoot, "bin", "conda"), "install", "-y", "-n", "base", ...channels, "conda-pack"]
    });
    if (res.exitCode !== 0) throw new Error(`conda-pack install failed (exit ${res.exitCode}): ${tailLines(res.stderr)}`);
    return bin;
  }

  async pack(env: MaterializedEnvironment): Promise<ArchiveBlob> {
    const condaPack = await this.ensureCondaPack();
    await fs.mkdir(this.options.outDir, { recursive: true });
    const outPath = path.join(this.options.outDir, `${env.name}.tar.gz`);
    await fs.rm(outPath, { force: true });

    const res = await this.options.runner.run({ argv: [condaPack, "--quiet", "-p", env.prefix, "-o", outPath] });
    if (res.exitCode !== 0) throw new Error(`conda-pack failed (exit ${res.exitCode}): ${tailLines(res.stderr)}`);

    const { sha256, sizeBytes } = await sha256File(outPath);
    return { path: outPath, sha256, sizeBytes };
  }
}

export type CommitOutcome =
  | { committed: true; blob: ArchiveBlob; record: CacheRecord }
  | { committed: false; error: CacheCommitFailedError };

export interface EnvironmentPackerOptions {
  packer: Packer;
  cache: CacheStore;
  instanceId: string | null;
  logger?: Logger;
}

/**
 * Packs a freshly built environment and commits it for later instances. Nothing here can fail the
 * current instance: it already has its environment, only future cache hits are at stake.
 */
export class EnvironmentPacker {
  private readonly logger: Logger;

  constructor(private readonly options: EnvironmentPackerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  pack(env: MaterializedEnvironment): Promise<ArchiveBlob> {
    return this.options.packer.pack(env);
  }

  commit(key: CacheKey, blob: ArchiveBlob): Promise<CacheRecord> {
    return this.options.cache.put(key, blob, { createdBy: this.options.instanceId });
  }

  async packAndCommit(key: CacheKey, env: MaterializedEnvironment): Promise<CommitOutcome> {
    let blob: ArchiveBlob;
    try {
      blob = await this.pack(env);
    } catch (err) {
      return this.failed(key, `packing ${env.name} failed: ${errorMessage(err)}`, err);
    }

    try {
      const record = await this.commit(key, blob);
      return { committed: true, blob, record };
    } catch (err) {
      return this.failed(key, `committing ${env.name} to the cache failed: ${errorMessage(err)}`, err);
    }
  }

  private failed(key: CacheKey, message: string, cause: unknown): CommitOutcome {
    const error = new CacheCommitFailedError(message, { cause });
    this.logger.warn("cache commit failed; continuing with the locally built environment", {
      code: error.code,
      spec_name: key.specName,
      fingerprint: key.fingerprint,
      error: message
    });
    return { committed: false, error };
  }
}
