import { createHash } from "crypto";

/** Deterministic byte stream derived from a label, so a failing case can be replayed. */
export class SeededBytes {
  private block: Buffer;
  private offset = 0;
  private counter = 0;

  constructor(private readonly seed: string) {
    this.block = this.next();
  }

  private next(): Buffer {
    this.counter += 1;
    return createHash("sha256").update(`${this.seed}|${this.counter}`).digest();
  }

  uint32(): number {
    if (this.offset + 4 > this.block.byteLength) {
      this.block = this.next();
      this.offset = 0;
    }
    const n = this.block.readUInt32BE(this.offset);
    this.offset += 4;
    return n;
  }

  intBelow(max: number): number {
    return this.uint32() % max;
  }
}

/** Returns a copy of `input` that differs from it in at least one byte. */
export function mutate(input: Buffer, rng: SeededBytes): Buffer {
  const out = Buffer.from(input);
  switch (rng.intBelow(3)) {
    case 0: {
      const i = rng.intBelow(out.byteLength);
      out[i] = ((out[i] ?? 0) + 1 + rng.intBelow(255)) % 256;
      return out;
    }
    case 1: {
      const i = rng.intBelow(out.byteLength + 1);
      return Buffer.concat([out.subarray(0, i), Buffer.from([rng.intBelow(256)]), out.subarray(i)]);
    }
    default: {
      const i = rng.intBelow(out.byteLength);
      return Buffer.concat([out.subarray(0, i), out.subarray(i + 1)]);
    }
  }
}
