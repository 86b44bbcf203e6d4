import { spawn } from "child_process";
import os from "os";

export interface CommandSpec {
  argv: string[];
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

/** Capability for every external program the provisioner drives (curl, conda, tar, ...). */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

const MAX_CAPTURE_BYTES = 1024 * 1024;

// Installer failures are explained at the end of their output, so the tail is what is kept.
class TailBuffer {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private dropped = false;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.bytes += chunk.byteLength;
    while (this.bytes > MAX_CAPTURE_BYTES && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (!head) break;
      const excess = this.bytes - MAX_CAPTURE_BYTES;
      if (head.byteLength <= excess) {
        this.chunks.shift();
        this.bytes -= head.byteLength;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.bytes -= excess;
      }
      this.dropped = true;
    }
  }

  toString(label: string): string {
    const text = Buffer.concat(this.chunks).toString("utf8");
    return this.dropped ? `[${label} truncated]\n${text}` : text;
  }
}

export class LocalCommandRunner implements CommandRunner {
  async run(spec: CommandSpec): Promise<CommandResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("command argv must be non-empty");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const
    });

    const stdout = new TailBuffer();
    const stderr = new TailBuffer();
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    const exitCode = await new Promise<number>((resolve, reject) => {
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

    return {
      exitCode,
      stdout: stdout.toString("stdout"),
      stderr: stderr.toString("stderr"),
      startedAt,
      finishedAt: new Date().toISOString()
    };
  }
}

export function tailLines(text: string, maxLines = 20): string {
  const lines = text.trimEnd().split(/\r?\n/);
  return lines.slice(-maxLines).join("\n");
}
