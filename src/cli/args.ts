/**
 * @file Command-line argument parsing
 */
import type { RawServerConfig } from "../config";
import { ConfigError } from "../config";

export type CliArgs = {
  help: boolean;
  /** Settings given on the command line; unset keys fall through to env/defaults. */
  overrides: RawServerConfig;
};

export const USAGE = `
Usage: cors-static-server [options] [root]

Serve a directory over HTTP with permissive CORS headers.

Options:
  --port, -p <number>   Port to listen on (env PORT, default 3000)
  --host, -H <host>     Address to bind (env HOST, default 0.0.0.0)
  --root, -r <dir>      Directory to serve (env SERVE_ROOT, default: current directory)
  --no-listing          Answer 404 for directories without an index file
  --quiet, -q           Do not log requests
  --help, -h            Show this help

Examples:
  cors-static-server
  cors-static-server ./public -p 8080
  PORT=4000 cors-static-server --no-listing
`;

const VALUE_FLAGS = new Map<string, "port" | "host" | "root">([
  ["--port", "port"],
  ["-p", "port"],
  ["--host", "host"],
  ["-H", "host"],
  ["--root", "root"],
  ["-r", "root"],
]);

/** Next argument as a flag value, unless it is missing or looks like another flag. */
function takeValue(rest: string[]): string | undefined {
  const next = rest[0];
  if (next === undefined || (next.startsWith("-") && next.length > 1)) {
    return undefined;
  }
  return rest.shift();
}

function splitOnce(s: string, sep: string): [string, string] {
  const at = s.indexOf(sep);
  return [s.slice(0, at), s.slice(at + sep.length)];
}

/** Parse argv (without the node/script prefix). Throws ConfigError on unknown or incomplete flags. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const overrides: RawServerConfig = {};
  const problems: string[] = [];
  const positionals: string[] = [];
  const rest = [...argv];
  const flags = { help: false };

  while (rest.length > 0) {
    const arg = rest.shift();
    if (arg === undefined) {
      break;
    }
    const [flag, inline]: [string, string | undefined] = arg.startsWith("--") && arg.includes("=") ? splitOnce(arg, "=") : [arg, undefined];
    const key = VALUE_FLAGS.get(flag);
    if (key) {
      const value = inline ?? takeValue(rest);
      if (value === undefined) {
        problems.push(`Missing value for ${flag}`);
      } else {
        overrides[key] = value;
      }
    } else if (flag === "--help" || flag === "-h") {
      flags.help = true;
    } else if (flag === "--no-listing") {
      overrides.listDirectories = false;
    } else if (flag === "--quiet" || flag === "-q") {
      overrides.logRequests = false;
    } else if (flag.startsWith("-") && flag.length > 1) {
      problems.push(`Unknown option: ${flag}`);
    } else {
      positionals.push(flag);
    }
  }

  if (positionals.length > 1) {
    problems.push(`Expected at most one directory argument, got: ${positionals.join(" ")}`);
  }
  if (positionals.length === 1) {
    if (overrides.root !== undefined) {
      problems.push("Give the directory either as --root or as an argument, not both");
    } else {
      overrides.root = positionals[0];
    }
  }
  if (problems.length > 0 && !flags.help) {
    throw new ConfigError(problems);
  }
  return { help: flags.help, overrides };
}
