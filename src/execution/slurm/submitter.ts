import type { CommandRunner } from "../commandRunner.js";

export interface SlurmSubmitResult {
  slurmJobId: string;
  cluster: string | null;
  stdout: string;
  stderr: string;
}

export interface SlurmSubmitter {
  submit(scriptPath: string): Promise<SlurmSubmitResult>;
}

/** Accepts `sbatch --parsable` output (`<id>` or `<id>;<cluster>`) and the human form. */
export function parseSbatchOutput(output: string): { jobId: string; cluster: string | null } | null {
  const trimmed = output.trim();
  if (!trimmed) return null;

  const parsable = /^(\d+)(?:;(\S+))?$/.exec(trimmed.split(/\s+/)[0] ?? "");
  if (parsable && parsable[1]) return { jobId: parsable[1], cluster: parsable[2] ?? null };

  const human = /Submitted batch job\s+(\d+)(?:\s+on cluster\s+(\S+))?/.exec(trimmed);
  if (human && human[1]) return { jobId: human[1], cluster: human[2] ?? null };
  return null;
}

export class SbatchSubmitter implements SlurmSubmitter {
  constructor(private readonly runner: CommandRunner) {}

  async submit(scriptPath: string): Promise<SlurmSubmitResult> {
    const res = await this.runner.run({ argv: ["sbatch", "--parsable", scriptPath] });
    if (res.exitCode !== 0) {
      throw new Error(`sbatch failed (exit ${res.exitCode})${res.stderr ? `: ${res.stderr.trim()}` : ""}`);
    }

    const parsed = parseSbatchOutput(res.stdout) ?? parseSbatchOutput(res.stderr);
    if (!parsed) throw new Error(`unable to parse sbatch job id from output: ${res.stdout || res.stderr}`);

    return { slurmJobId: parsed.jobId, cluster: parsed.cluster, stdout: res.stdout, stderr: res.stderr };
  }
}
