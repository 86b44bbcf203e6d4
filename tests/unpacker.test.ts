import { describe, it, expect } from "vitest";
import { access, mkdir, mkdtemp, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { ArchiveBlob } from "../src/cache/cacheStore.js";
import { sha256Digest } from "../src/core/digest.js";
import { RelocationFailedError, UnpackFailedError } from "../src/core/errors.js";
import { EnvironmentUnpacker } from "../src/env/unpacker.js";
import type { CommandSpec } from "../src/execution/commandRunner.js";
import { FakeCommandRunner } from "./helpers/fakes.js";

const BLOB: ArchiveBlob = { path: "/scratch/analysis.tar.gz", sha256: sha256Digest("archive"), sizeBytes: 7n };
const TARGET = { name: "analysis", fingerprint: sha256Digest("spec") };

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

// Simulates tar laying out a conda-pack archive.
async function extractRelocatable(cmd: CommandSpec): Promise<void> {
  const dest = cmd.argv[cmd.argv.indexOf("-C") + 1];
  if (!dest) return;
  await mkdir(path.join(dest, "bin"), { recursive: true });
  await writeFile(path.join(dest, "bin", "conda-unpack"), "#!/bin/sh\n", "utf8");
}

describe("EnvironmentUnpacker", () => {
  it("extracts and relocates into the target prefix", async () => {
    const prefix = path.join(await mkdtemp(path.join(os.tmpdir(), "envprov-unpack-")), "envs", "analysis");
    const runner = new FakeCommandRunner(async (cmd) => {
      if (cmd.argv[0] === "tar") await extractRelocatable(cmd);
      return {};
    });

    const env = await new EnvironmentUnpacker({ runner }).unpack(BLOB, prefix, TARGET);

    expect(env).toEqual({ name: "analysis", prefix, fingerprint: TARGET.fingerprint, origin: "restored" });
    expect(runner.calls[0]).toEqual({ argv: ["tar", "-xzf", BLOB.path, "-C", prefix] });
    const relocate = runner.calls[1];
    expect(relocate?.argv).toEqual([path.join(prefix, "bin", "conda-unpack")]);
    expect(relocate?.cwd).toBe(prefix);
    expect(relocate?.env?.CONDA_PREFIX).toBe(prefix);
    expect(relocate?.env?.CONDA_DEFAULT_ENV).toBe("analysis");
  });

  it("removes the partial prefix when extraction fails", async () => {
    const prefix = path.join(await mkdtemp(path.join(os.tmpdir(), "envprov-unpack-")), "analysis");
    const runner = new FakeCommandRunner(() => ({ exitCode: 2, stderr: "gzip: stdin: unexpected end of file\n" }));

    const err = await new EnvironmentUnpacker({ runner }).unpack(BLOB, prefix, TARGET).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnpackFailedError);
    expect(err).toMatchObject({
      message: `extracting ${BLOB.path} failed (exit 2): gzip: stdin: unexpected end of file`
    });
    expect(await exists(prefix)).toBe(false);
  });

  it("refuses an archive without a relocation script", async () => {
    const prefix = path.join(await mkdtemp(path.join(os.tmpdir(), "envprov-unpack-")), "analysis");
    const runner = new FakeCommandRunner();

    const err = await new EnvironmentUnpacker({ runner }).unpack(BLOB, prefix, TARGET).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RelocationFailedError);
    expect(err).toMatchObject({
      message: `${path.join(prefix, "bin", "conda-unpack")} is missing; archive is not relocatable`
    });
    expect(runner.calls).toHaveLength(1);
    expect(await exists(prefix)).toBe(false);
  });

  it("reports a failing relocation script", async () => {
    const prefix = path.join(await mkdtemp(path.join(os.tmpdir(), "envprov-unpack-")), "analysis");
    const runner = new FakeCommandRunner(async (cmd) => {
      if (cmd.argv[0] === "tar") {
        await extractRelocatable(cmd);
        return {};
      }
      return { exitCode: 1, stderr: "PermissionError: [Errno 13]\n" };
    });

    const err = await new EnvironmentUnpacker({ runner }).unpack(BLOB, prefix, TARGET).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RelocationFailedError);
    expect(err).toMatchObject({ stage: "restore", message: "conda-unpack failed (exit 1): PermissionError: [Errno 13]" });
    expect(await exists(prefix)).toBe(false);
  });
});
