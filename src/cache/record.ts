import path from "path";
import * as z from "zod/v4";
import { stableJsonStringify } from "../core/canonicalJson.js";
import { isSha256Digest, type Sha256Digest } from "../core/digest.js";
import { ENV_NAME_PATTERN } from "../spec/environmentSpec.js";

export const CACHE_RECORD_VERSION = 1 as const;

const DigestSchema = z.custom<Sha256Digest>((v) => isSha256Digest(v), "expected sha256:<64 hex>");

const CacheRecordSchema = z.object({
  record_version: z.literal(CACHE_RECORD_VERSION),
  fingerprint: DigestSchema,
  spec_name: z.string().regex(ENV_NAME_PATTERN),
  archive: z.string().min(1),
  archive_sha256: DigestSchema,
  archive_size_bytes: z.string().regex(/^\d+$/),
  created_at: z.string().min(1),
  created_by: z.string().nullable()
});

/**
 * The published proof of freshness for one spec name: which fingerprint the cached archive
 * was built from and the digest the archive must match on fetch.
 */
export type CacheRecord = z.infer<typeof CacheRecordSchema>;

function isContainedRelativePath(rel: string): boolean {
  if (path.isAbsolute(rel)) return false;
  const normalized = path.normalize(rel);
  return normalized !== ".." && !normalized.startsWith(`..${path.sep}`);
}

export function encodeCacheRecord(record: CacheRecord): string {
  return `${stableJsonStringify(record, 2)}\n`;
}

export function parseCacheRecord(text: string): { record: CacheRecord } | { error: string } {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    return { error: `record is not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = CacheRecordSchema.safeParse(doc);
  if (!parsed.success) return { error: z.prettifyError(parsed.error) };
  if (!isContainedRelativePath(parsed.data.archive)) {
    return { error: `archive path escapes the cache root: ${parsed.data.archive}` };
  }
  return { record: parsed.data };
}
