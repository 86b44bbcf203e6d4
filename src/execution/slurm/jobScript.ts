import { promises as fs } from "fs";
import { hashFile } from "../../core/digest.js";
import { errorMessage } from "../../core/errors.js";
import type { CommandRunner } from "../commandRunner.js";

export interface JobScriptInfo {
  path: string;
  sha256: string;
  md5: string;
  lineCount: number;
}

export interface JobScriptQueryResult {
  info: JobScriptInfo | null;
  warnings: string[];
}

export function parseScontrolCommand(stdout: string): string | null {
  const m = /(?:^|\s)Command=(\S+)/m.exec(stdout);
  if (!m || !m[1] || m[1] === "(null)") return null;
  return m[1];
}

export async function describeScriptFile(scriptPath: string): Promise<JobScriptInfo> {
  const sha256 = await hashFile(scriptPath, "sha256");
  const md5 = await hashFile(scriptPath, "md5");
  const text = await fs.readFile(scriptPath, "utf8");
  const newlines = text.match(/\n/g);
  return { path: scriptPath, sha256: sha256.hex, md5: md5.hex, lineCount: newlines ? newlines.length : 0 };
}

/** Best effort: job metadata is logged, never required. */
export async function describeJobScript(jobId: string, runner: CommandRunner): Promise<JobScriptQueryResult> {
  let stdout: string;
  try {
    const res = await runner.run({ argv: ["scontrol", "show", "job", jobId] });
    if (res.exitCode !== 0) {
      return { info: null, warnings: [`scontrol failed (exit ${res.exitCode})${res.stderr.trim() ? `: ${res.stderr.trim()}` : ""}`] };
    }
    stdout = res.stdout;
  } catch (err) {
    return { info: null, warnings: [`scontrol unavailable: ${errorMessage(err)}`] };
  }

  const scriptPath = parseScontrolCommand(stdout);
  if (!scriptPath) return { info: null, warnings: [`scontrol reported no Command= for job ${jobId}`] };

  try {
    return { info: await describeScriptFile(scriptPath), warnings: [] };
  } catch (err) {
    return { info: null, warnings: [`job script ${scriptPath} unreadable: ${errorMessage(err)}`] };
  }
}
