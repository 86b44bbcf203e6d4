import { createHash } from "crypto";
import { ulid } from "ulid";

const CROCKFORD_BASE32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

export type InstanceId = `inst_${string}`;
export type ProvisionId = `prov_${string}`;

export function encodeCrockfordBase32_128bits(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);

  let out = "";
  for (let i = 0; i < 26; i++) {
    out = CROCKFORD_BASE32_ALPHABET[Number(value & 31n)] + out;
    value >>= 5n;
  }
  return out;
}

export function newInstanceId(): InstanceId {
  return `inst_${ulid()}` as const;
}

export function newProvisionId(): ProvisionId {
  return `prov_${ulid()}` as const;
}

/** Same parts, same id. */
export function deriveInstanceIdFromParts(parts: string[]): InstanceId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return `inst_${encodeCrockfordBase32_128bits(h.digest().subarray(0, 16))}` as const;
}
