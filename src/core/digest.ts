import { createHash } from "crypto";
import { promises as fs } from "fs";

export type Sha256Digest = `sha256:${string}`;

const SHA256_DIGEST_PATTERN = /^sha256:[0-9a-f]{64}$/;

export function isSha256Digest(value: unknown): value is Sha256Digest {
  return typeof value === "string" && SHA256_DIGEST_PATTERN.test(value);
}

export function sha256Digest(data: string | Uint8Array): Sha256Digest {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

export function digestHex(digest: Sha256Digest): string {
  return digest.slice("sha256:".length);
}

export interface FileDigest {
  hex: string;
  sizeBytes: bigint;
}

export async function hashFile(filePath: string, algorithm: "sha256" | "md5" = "sha256"): Promise<FileDigest> {
  const hash = createHash(algorithm);
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(1024 * 1024);
    let total = 0n;
    for (;;) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      total += BigInt(bytesRead);
      hash.update(buf.subarray(0, bytesRead));
    }
    return { hex: hash.digest("hex"), sizeBytes: total };
  } finally {
    await fd.close();
  }
}

export async function sha256File(filePath: string): Promise<{ sha256: Sha256Digest; sizeBytes: bigint }> {
  const { hex, sizeBytes } = await hashFile(filePath, "sha256");
  return { sha256: `sha256:${hex}` as const, sizeBytes };
}
