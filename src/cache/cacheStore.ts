import type { Sha256Digest } from "../core/digest.js";
import type { Fingerprint } from "../spec/fingerprint.js";
import type { CacheRecord } from "./record.js";

/** An opaque packed environment and its content digest. */
export interface ArchiveBlob {
  path: string;
  sha256: Sha256Digest;
  sizeBytes: bigint;
}

/** Records are kept per spec name; the fingerprint decides whether the record is fresh. */
export interface CacheKey {
  specName: string;
  fingerprint: Fingerprint;
}

export interface PutOptions {
  createdBy: string | null;
}

/**
 * Shared durable store of packed environments. Concurrent readers are expected; writers for one
 * key are tolerated, last writer wins. Nothing here takes a lock.
 */
export interface CacheStore {
  /** Compares the published record only; never touches the archive. */
  has(key: CacheKey): Promise<boolean>;
  /** Copies the verified archive into `destDir`. Throws CacheMissError or CacheReadError. */
  fetch(key: CacheKey, destDir: string): Promise<ArchiveBlob>;
  /** Writes the archive, then publishes the record. */
  put(key: CacheKey, blob: ArchiveBlob, options: PutOptions): Promise<CacheRecord>;
}
