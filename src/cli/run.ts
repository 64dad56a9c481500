/**
 * @file CLI flow: parse, start, print the banner, stop on a signal
 */
import { parseCliArgs, USAGE } from "./args";
import { describeStartupError } from "./describe_error";
import { loadServerConfig } from "../config";
import { formatBanner, startServer, type RunningServer } from "../http-server";
import { errorMessage } from "../util/is-error";

/** Process-facing effects of the CLI, injected so the flow can run in tests. */
export type CliDeps = {
  readonly log: (line: string) => void;
  readonly error: (line: string) => void;
  readonly exit: (code: number) => void;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
};

export function processDeps(): CliDeps {
  return {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
    exit: (code) => process.exit(code),
    env: process.env,
    cwd: process.cwd(),
    onSignal: (signal, handler) => {
      process.once(signal, handler);
    },
  };
}

/** On SIGINT or SIGTERM: print the notice, close the server, exit 0 (1 if closing fails). */
export function installShutdown(running: RunningServer, deps: CliDeps): void {
  const state = { stopping: false };
  const shutdown = () => {
    if (state.stopping) {
      return;
    }
    state.stopping = true;
    deps.log("Server stopped");
    void running.stop().then(
      () => deps.exit(0),
      (e: unknown) => {
        deps.error(`Error while stopping: ${errorMessage(e)}`);
        deps.exit(1);
      },
    );
  };
  deps.onSignal("SIGINT", shutdown);
  deps.onSignal("SIGTERM", shutdown);
}

/**
 * Run the CLI with `argv` (without node and script).
 * Resolves with the running server, or null after `--help` or a startup failure (exit 1).
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<RunningServer | null> {
  const attempt: { port?: number } = {};
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      deps.log(USAGE);
      return null;
    }
    const cfg = await loadServerConfig(args.overrides, deps.env, deps.cwd);
    attempt.port = cfg.port;
    const running = await startServer(cfg);
    for (const line of formatBanner(running.info)) {
      deps.log(line);
    }
    installShutdown(running, deps);
    return running;
  } catch (e) {
    deps.error(describeStartupError(e, attempt.port));
    deps.exit(1);
    return null;
  }
}
