#!/usr/bin/env node
/**
 * sealgate CLI entry point.
 *
 * Usage:
 *   sealgate <command> [options]
 *
 * Commands:
 *   init                          Create the data directories
 *   config show [--json]          Show resolved configuration
 *   generate [options]            Build, gate and seal an audit package
 *   verify <package.json>         Recompute and check a package's seal
 */

import { createLogger } from "../logging/logger.js";
import { parseArgs } from "./args.js";
import { cmdConfigShow, cmdGenerate, cmdInit, cmdVerify, exitCodeFor } from "./commands.js";
import { resolveConfig } from "./config.js";

const USAGE = `sealgate: compliance audit packages for agent releases

Usage:
  sealgate init
  sealgate config show [--json]
  sealgate generate --agent-config <yaml|json> --assay-report <json> --bom <json>
                    --agent-version <v> [--user <id>] [--out <file>] [--format json] [--archive]
  sealgate verify <package.json> [--json]

Exit codes:
  0  success
  1  error
  2  compliance gate failed

Environment:
  SEALGATE_SIGNING_KEY   Key for the local signer (required by generate)
  SEALGATE_SESSION_DB    Read-only session store to replay deviations from
  SEALGATE_ARCHIVE_ROOT  Archive root for --archive
  SEALGATE_STRICT_MODE   Block on non-critical coverage gaps as well
`;

async function main(): Promise<number> {
  const raw = process.argv.slice(2);
  if (raw.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(raw);
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = resolveConfig();
  const command = positional[0];

  switch (command) {
    case "init":
      return cmdInit(config);

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    case "generate":
      return cmdGenerate(flags, config, undefined, {
        logger: createLogger({ level: config.logLevel, stderr: true }),
      });

    case "verify": {
      const file = positional[1];
      if (!file) {
        process.stderr.write("Usage: sealgate verify <package.json>\n");
        return 1;
      }
      return cmdVerify(file, config, json);
    }

    default:
      process.stderr.write(`Unknown command: ${command ?? ""}\n\n${USAGE}`);
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(exitCodeFor(e));
  },
);
