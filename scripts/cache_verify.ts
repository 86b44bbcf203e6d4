import path from "path";
import { LocalCacheStore } from "../src/cache/localCacheStore.js";
import { parseArgs, stringFlag } from "../src/cli/args.js";
import { stableJsonStringify } from "../src/core/canonicalJson.js";
import { errorMessage } from "../src/core/errors.js";
import { parseEnvironmentSpec } from "../src/spec/environmentSpec.js";
import { SpecFingerprinter, type Fingerprint } from "../src/spec/fingerprint.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/cache_verify.ts --cache-dir <dir> (--spec <environment.yaml> | --name <env name>) [--json]",
    "",
    "notes:",
    "  - Re-hashes the cached archive against its published record.",
    "  - With --spec, also reports whether the record is fresh for the spec's current content.",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.flags.help) {
    process.stdout.write(usage());
    return;
  }
  const cacheDir = stringFlag(args, "cache-dir");
  if (!cacheDir) throw new Error(`--cache-dir is required\n\n${usage()}`);

  const specPath = stringFlag(args, "spec");
  let name = stringFlag(args, "name");
  let expected: Fingerprint | undefined;
  if (specPath) {
    const read = await new SpecFingerprinter().fingerprintFile(path.resolve(specPath));
    name = parseEnvironmentSpec(read.bytes, read.specPath).name;
    expected = read.fingerprint;
  }
  if (!name) throw new Error(`--spec or --name is required\n\n${usage()}`);

  const report = await new LocalCacheStore(path.resolve(cacheDir)).verify(name, expected);
  if (args.flags.json) {
    process.stdout.write(`${stableJsonStringify(report, 2)}\n`);
  } else {
    for (const p of report.problems) process.stdout.write(`${name}: ${p}\n`);
  }
  if (report.problems.length > 0) {
    process.exitCode = 1;
    return;
  }
  if (!args.flags.json) process.stdout.write("ok\n");
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
