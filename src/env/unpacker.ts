import { promises as fs } from "fs";
import path from "path";
import { RelocationFailedError, UnpackFailedError, errnoCode, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { ArchiveBlob } from "../cache/cacheStore.js";
import { tailLines, type CommandResult, type CommandRunner } from "../execution/commandRunner.js";
import type { Fingerprint } from "../spec/fingerprint.js";
import { activationEnv, type MaterializedEnvironment } from "./environment.js";

export interface UnpackTarget {
  name: string;
  fingerprint: Fingerprint;
}

export interface Unpacker {
  unpack(blob: ArchiveBlob, targetDir: string, target: UnpackTarget): Promise<MaterializedEnvironment>;
}

export interface EnvironmentUnpackerOptions {
  runner: CommandRunner;
  logger?: Logger;
}

/**
 * Restores a packed environment into `targetDir` and rewrites the prefixes baked in at build time.
 * On any failure the partial directory is removed before the error propagates.
 */
export class EnvironmentUnpacker implements Unpacker {
  private readonly logger: Logger;

  constructor(private readonly options: EnvironmentUnpackerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async unpack(blob: ArchiveBlob, targetDir: string, target: UnpackTarget): Promise<MaterializedEnvironment> {
    const prefix = path.resolve(targetDir);
    try {
      await fs.rm(prefix, { recursive: true, force: true });
      await fs.mkdir(prefix, { recursive: true });
      await this.extract(blob, prefix);
      const env: MaterializedEnvironment = { name: target.name, prefix, fingerprint: target.fingerprint, origin: "restored" };
      await this.relocate(env);
      return env;
    } catch (err) {
      await fs.rm(prefix, { recursive: true, force: true });
      if (err instanceof UnpackFailedError || err instanceof RelocationFailedError) throw err;
      throw new UnpackFailedError(`restoring ${target.name} into ${prefix} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async extract(blob: ArchiveBlob, prefix: string): Promise<void> {
    this.logger.info("unpacking cached environment", { archive: blob.path, prefix });
    let res: CommandResult;
    try {
      res = await this.options.runner.run({ argv: ["tar", "-xzf", blob.path, "-C", prefix] });
    } catch (err) {
      throw new UnpackFailedError(`tar could not be run: ${errorMessage(err)}`, { cause: err });
    }
    if (res.exitCode !== 0) {
      throw new UnpackFailedError(`extracting ${blob.path} failed (exit ${res.exitCode}): ${tailLines(res.stderr)}`);
    }
  }

  private async relocate(env: MaterializedEnvironment): Promise<void> {
    const unpackScript = path.join(env.prefix, "bin", "conda-unpack");
    try {
      await fs.access(unpackScript);
    } catch (err) {
      throw new RelocationFailedError(
        `${unpackScript} is ${errnoCode(err) === "ENOENT" ? "missing" : "not accessible"}; archive is not relocatable`,
        { cause: err }
      );
    }

    let res: CommandResult;
    try {
      res = await this.options.runner.run({ argv: [unpackScript], cwd: env.prefix, env: activationEnv(env) });
    } catch (err) {
      throw new RelocationFailedError(`conda-unpack could not be run: ${errorMessage(err)}`, { cause: err });
    }
    if (res.exitCode !== 0) {
      throw new RelocationFailedError(`conda-unpack failed (exit ${res.exitCode}): ${tailLines(res.stderr)}`);
    }
  }
}
