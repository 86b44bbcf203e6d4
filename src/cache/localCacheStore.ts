import { createHash } from "crypto";
import { createReadStream, createWriteStream, promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import { ulid } from "ulid";
import { digestHex, sha256File, type Sha256Digest } from "../core/digest.js";
import { CacheMissError, CacheReadError, errnoCode, errorMessage, isTransientIoError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { fingerprintHex, type Fingerprint } from "../spec/fingerprint.js";
import type { ArchiveBlob, CacheKey, CacheStore, PutOptions } from "./cacheStore.js";
import { CACHE_RECORD_VERSION, encodeCacheRecord, parseCacheRecord, type CacheRecord } from "./record.js";

const DIR_SYNC_UNSUPPORTED = new Set(["EINVAL", "EPERM", "EROFS", "EISDIR", "ENOTSUP"]);

export interface LocalCacheStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

export interface CacheVerifyReport {
  specName: string;
  record: CacheRecord | null;
  problems: string[];
}

function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe cache path: ${name}`);
  }
  return joined;
}

async function copyWithDigest(sourcePath: string, destPath: string): Promise<{ sha256: Sha256Digest; sizeBytes: bigint }> {
  const hash = createHash("sha256");
  let total = 0n;
  const tap = new Transform({
    transform(chunk: Buffer, _enc, cb) {
      total += BigInt(chunk.byteLength);
      hash.update(chunk);
      cb(null, chunk);
    }
  });
  await pipeline(createReadStream(sourcePath), tap, createWriteStream(destPath));
  return { sha256: `sha256:${hash.digest("hex")}` as const, sizeBytes: total };
}

/**
 * CacheStore on a shared filesystem.
 *
 *   <root>/records/<spec name>.json                  published record, replaced by rename
 *   <root>/archives/<fingerprint>/<archive sha>.tar.gz  content-addressed, never rewritten
 *
 * Because an archive's file name is its own digest, a record can only ever point at the bytes it
 * describes, even while another instance is committing the same fingerprint.
 */
export class LocalCacheStore implements CacheStore {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    readonly rootDir: string,
    options: LocalCacheStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  get recordsDir(): string {
    return path.join(this.rootDir, "records");
  }

  recordPath(specName: string): string {
    return safeJoin(this.recordsDir, `${specName}.json`);
  }

  archiveRelPath(fingerprint: Fingerprint, archiveSha256: Sha256Digest): string {
    return path.posix.join("archives", fingerprintHex(fingerprint), `${digestHex(archiveSha256)}.tar.gz`);
  }

  /** Raw view of the record file: null when absent, `error` when present but unusable. */
  async inspectRecord(
    specName: string,
    stage: "lookup" | "restore" = "lookup"
  ): Promise<{ record: CacheRecord } | { error: string } | null> {
    let text: string;
    try {
      text = await fs.readFile(this.recordPath(specName), "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw new CacheReadError(`reading cache record for ${specName} failed: ${errorMessage(err)}`, {
        transient: isTransientIoError(err),
        stage,
        cause: err
      });
    }
    const parsed = parseCacheRecord(text);
    if ("record" in parsed && parsed.record.spec_name !== specName) {
      return { error: `record names spec ${parsed.record.spec_name}` };
    }
    return parsed;
  }

  async readRecord(specName: string, stage: "lookup" | "restore" = "lookup"): Promise<CacheRecord | null> {
    const inspected = await this.inspectRecord(specName, stage);
    if (inspected === null) return null;
    if ("error" in inspected) {
      this.logger.warn("ignoring unusable cache record", { spec_name: specName, reason: inspected.error });
      return null;
    }
    return inspected.record;
  }

  async has(key: CacheKey): Promise<boolean> {
    const record = await this.readRecord(key.specName, "lookup");
    return record !== null && record.fingerprint === key.fingerprint;
  }

  async fetch(key: CacheKey, destDir: string): Promise<ArchiveBlob> {
    const record = await this.readRecord(key.specName, "restore");
    if (!record) throw new CacheMissError(`no cache record for ${key.specName}`);
    if (record.fingerprint !== key.fingerprint) {
      throw new CacheMissError(`cache record for ${key.specName} holds ${record.fingerprint}, not ${key.fingerprint}`);
    }

    const sourcePath = safeJoin(this.rootDir, record.archive);
    await fs.mkdir(destDir, { recursive: true });
    const destPath = path.join(destDir, `${key.specName}.tar.gz`);

    let copied: { sha256: Sha256Digest; sizeBytes: bigint };
    try {
      copied = await copyWithDigest(sourcePath, destPath);
    } catch (err) {
      await fs.rm(destPath, { force: true });
      if (errnoCode(err) === "ENOENT") {
        throw new CacheReadError(`cached archive ${record.archive} is missing`, { transient: false, cause: err });
      }
      throw new CacheReadError(`reading cached archive ${record.archive} failed: ${errorMessage(err)}`, {
        transient: isTransientIoError(err),
        cause: err
      });
    }

    if (copied.sha256 !== record.archive_sha256 || copied.sizeBytes.toString() !== record.archive_size_bytes) {
      await fs.rm(destPath, { force: true });
      throw new CacheReadError(
        `cached archive ${record.archive} is corrupt (expected ${record.archive_sha256}, ${record.archive_size_bytes} bytes; ` +
          `got ${copied.sha256}, ${copied.sizeBytes.toString()} bytes)`,
        { transient: false }
      );
    }

    return { path: destPath, sha256: copied.sha256, sizeBytes: copied.sizeBytes };
  }

  /** Copies the blob under its content-addressed name and returns that path relative to the root. */
  async writeArchive(key: CacheKey, blob: ArchiveBlob): Promise<string> {
    const rel = this.archiveRelPath(key.fingerprint, blob.sha256);
    const finalPath = safeJoin(this.rootDir, rel);
    const dir = path.dirname(finalPath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = path.join(dir, `.${ulid()}.partial`);
    try {
      const copied = await copyWithDigest(blob.path, tmpPath);
      if (copied.sha256 !== blob.sha256) {
        throw new Error(`archive ${blob.path} changed while copying (expected ${blob.sha256}, got ${copied.sha256})`);
      }
      await this.syncFile(tmpPath);
      await fs.rename(tmpPath, finalPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    await this.syncDir(dir);
    return rel;
  }

  async publishRecord(record: CacheRecord): Promise<void> {
    const target = this.recordPath(record.spec_name);
    await fs.mkdir(this.recordsDir, { recursive: true });

    const tmpPath = path.join(this.recordsDir, `.${record.spec_name}.${ulid()}.partial`);
    try {
      const handle = await fs.open(tmpPath, "w");
      try {
        await handle.writeFile(encodeCacheRecord(record), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, target);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    await this.syncDir(this.recordsDir);
  }

  protected async syncFile(filePath: string): Promise<void> {
    const handle = await fs.open(filePath, "r+");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  /** Makes a rename in `dir` durable. Filesystems that cannot fsync a directory are tolerated. */
  protected async syncDir(dir: string): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await fs.open(dir, "r");
    } catch (err) {
      if (DIR_SYNC_UNSUPPORTED.has(errnoCode(err) ?? "")) return;
      throw err;
    }
    try {
      await handle.sync();
    } catch (err) {
      const code = errnoCode(err);
      if (!DIR_SYNC_UNSUPPORTED.has(code ?? "")) throw err;
      this.logger.debug("directory fsync unsupported", { dir, errno: code });
    } finally {
      await handle.close();
    }
  }

  async put(key: CacheKey, blob: ArchiveBlob, options: PutOptions): Promise<CacheRecord> {
    const archive = await this.writeArchive(key, blob);
    const record: CacheRecord = {
      record_version: CACHE_RECORD_VERSION,
      fingerprint: key.fingerprint,
      spec_name: key.specName,
      archive,
      archive_sha256: blob.sha256,
      archive_size_bytes: blob.sizeBytes.toString(),
      created_at: this.clock().toISOString(),
      created_by: options.createdBy
    };
    await this.publishRecord(record);
    this.logger.info("cache entry published", {
      spec_name: key.specName,
      fingerprint: key.fingerprint,
      archive,
      archive_size_bytes: blob.sizeBytes
    });
    return record;
  }

  /** Offline integrity check of one entry; optionally also whether it is fresh for `expected`. */
  async verify(specName: string, expected?: Fingerprint): Promise<CacheVerifyReport> {
    const inspected = await this.inspectRecord(specName);
    if (inspected === null) return { specName, record: null, problems: ["no cache record"] };
    if ("error" in inspected) return { specName, record: null, problems: [`unusable cache record: ${inspected.error}`] };

    const record = inspected.record;
    const problems: string[] = [];
    if (expected !== undefined && record.fingerprint !== expected) {
      problems.push(`record is stale: holds ${record.fingerprint}, spec is ${expected}`);
    }

    try {
      const { sha256, sizeBytes } = await sha256File(safeJoin(this.rootDir, record.archive));
      if (sha256 !== record.archive_sha256) {
        problems.push(`sha256 mismatch for ${record.archive} (expected ${record.archive_sha256}, got ${sha256})`);
      }
      if (sizeBytes.toString() !== record.archive_size_bytes) {
        problems.push(`size mismatch for ${record.archive} (expected ${record.archive_size_bytes}, got ${sizeBytes.toString()})`);
      }
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
      problems.push(`archive ${record.archive} is missing`);
    }

    return { specName, record, problems };
  }
}
