import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { SpecUnavailableError } from "../src/core/errors.js";
import { SpecFingerprinter, fingerprintHex, type Hasher } from "../src/spec/fingerprint.js";
import { SeededBytes, mutate } from "./helpers/mutations.js";

const SPEC = Buffer.from(
  ["name: analysis", "channels:", "  - conda-forge", "dependencies:", "  - python=3.11", "  - numpy=1.26", ""].join("\n"),
  "utf8"
);

describe("SpecFingerprinter", () => {
  it("is a sha256 digest of the exact bytes", () => {
    const fp = new SpecFingerprinter().fingerprint(Buffer.from("abc", "utf8"));
    expect(fp).toBe("sha256:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    expect(fingerprintHex(fp)).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("returns the same fingerprint for identical bytes", () => {
    const fingerprinter = new SpecFingerprinter();
    expect(fingerprinter.fingerprint(SPEC)).toBe(fingerprinter.fingerprint(Buffer.from(SPEC)));
  });

  it("changes for any single-byte edit", () => {
    const fingerprinter = new SpecFingerprinter();
    const base = fingerprinter.fingerprint(SPEC);
    const rng = new SeededBytes("fingerprint-sensitivity");
    for (let i = 0; i < 200; i += 1) {
      const changed = mutate(SPEC, rng);
      expect(changed.equals(SPEC)).toBe(false);
      expect(fingerprinter.fingerprint(changed)).not.toBe(base);
    }
  });

  it("treats whitespace and line endings as significant", () => {
    const fingerprinter = new SpecFingerprinter();
    const crlf = Buffer.from(SPEC.toString("utf8").replace(/\n/g, "\r\n"), "utf8");
    const trailing = Buffer.concat([SPEC, Buffer.from("\n")]);
    expect(fingerprinter.fingerprint(crlf)).not.toBe(fingerprinter.fingerprint(SPEC));
    expect(fingerprinter.fingerprint(trailing)).not.toBe(fingerprinter.fingerprint(SPEC));
  });

  it("hashes the bytes it read and returns them", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "envprov-fp-"));
    const specPath = path.join(dir, "environment.yaml");
    await writeFile(specPath, SPEC);

    const fingerprinter = new SpecFingerprinter();
    const read = await fingerprinter.fingerprintFile(specPath);
    expect(read.specPath).toBe(specPath);
    expect(read.bytes.equals(SPEC)).toBe(true);
    expect(read.fingerprint).toBe(fingerprinter.fingerprint(SPEC));
  });

  it("reports a missing spec as SpecUnavailable", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "envprov-fp-"));
    const missing = path.join(dir, "nope.yaml");
    const err = await new SpecFingerprinter().fingerprintFile(missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SpecUnavailableError);
    expect(err).toMatchObject({
      code: "SPEC_UNAVAILABLE",
      stage: "fingerprint",
      message: `environment spec ${missing} is unreadable (ENOENT)`
    });
  });

  it("delegates to an injected hasher", () => {
    const seen: number[] = [];
    const hasher: Hasher = {
      digest: (bytes) => {
        seen.push(bytes.byteLength);
        return `sha256:${"0".repeat(64)}`;
      }
    };
    expect(new SpecFingerprinter(hasher).fingerprint(SPEC)).toBe(`sha256:${"0".repeat(64)}`);
    expect(seen).toEqual([SPEC.byteLength]);
  });
});
