export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  /** Everything after a bare `--`, passed through untouched. */
  rest: string[];
}

const BOOLEAN_FLAGS = new Set(["help", "submit", "json"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a === "--") return { flags, rest: argv.slice(i + 1) };
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);

    const eq = a.indexOf("=");
    if (eq > 2) {
      flags[a.slice(2, eq)] = a.slice(eq + 1);
      continue;
    }
    const key = a.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    flags[key] = next;
    i++;
  }
  return { flags, rest: [] };
}

export function stringFlag(args: ParsedArgs, key: string): string | undefined {
  const v = args.flags[key];
  return typeof v === "string" ? v : undefined;
}
