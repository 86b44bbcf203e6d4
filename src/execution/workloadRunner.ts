import { spawn } from "child_process";
import os from "os";

export interface WorkloadOptions {
  env: Record<string, string>;
  cwd?: string;
}

/**
 * Hands the terminal over to the workload and resolves with the exit status a shell would
 * report: the exit code, or 128 + signal number when it was killed.
 */
export async function runWorkload(argv: string[], options: WorkloadOptions): Promise<number> {
  const [command, ...args] = argv;
  if (!command) throw new Error("workload argv must be non-empty");

  const child = spawn(command, args, { cwd: options.cwd, env: options.env, stdio: "inherit" });

  return new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== null) {
        resolve(code);
        return;
      }
      const signo = signal ? os.constants.signals[signal] : undefined;
      resolve(128 + (signo ?? 0));
    });
  });
}
