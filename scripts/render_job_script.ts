import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { parseArgs, stringFlag } from "../src/cli/args.js";
import { errorMessage } from "../src/core/errors.js";
import { LocalCommandRunner } from "../src/execution/commandRunner.js";
import { ProvisionJobSpecSchema, renderProvisionScript } from "../src/execution/slurm/provisionScript.js";
import { SbatchSubmitter } from "../src/execution/slurm/submitter.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/render_job_script.ts --job <job.yaml> [--out <script.sh>] [--submit]",
    "",
    "notes:",
    "  - Without --out the script is written to stdout.",
    "  - --submit requires --out and hands the script to sbatch.",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.flags.help) {
    process.stdout.write(usage());
    return;
  }
  const jobPath = stringFlag(args, "job");
  if (!jobPath) throw new Error(`--job is required\n\n${usage()}`);

  const parsed = ProvisionJobSpecSchema.safeParse(YAML.parse(await fs.readFile(jobPath, "utf8")));
  if (!parsed.success) throw new Error(`${jobPath} is invalid: ${z.prettifyError(parsed.error)}`);
  const script = renderProvisionScript(parsed.data);

  const out = stringFlag(args, "out");
  if (!out) {
    if (args.flags.submit) throw new Error("--submit requires --out");
    process.stdout.write(script);
    return;
  }

  const outPath = path.resolve(out);
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, script, { encoding: "utf8", mode: 0o755 });
  process.stdout.write(`${outPath}\n`);

  if (args.flags.submit) {
    const res = await new SbatchSubmitter(new LocalCommandRunner()).submit(outPath);
    process.stdout.write(`submitted job ${res.slurmJobId}${res.cluster ? ` on ${res.cluster}` : ""}\n`);
  }
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
