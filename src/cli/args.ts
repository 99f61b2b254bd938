export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
}

/**
 * `--name value` sets a flag; `--name` followed by another flag or by
 * nothing is a boolean flag.
 */
export function parseArgs(argv: ReadonlyArray<string>): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}
