import { writeFile } from "node:fs/promises";
import { renderReport } from "../report/index.js";
import { reviewRepository, type ReviewRequest } from "../review/pipeline.js";
import { ConfigError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { USAGE, parseArgs } from "./args.js";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CONFIG = 2;

/**
 * Runs the CLI and returns its exit code: 0 once a report is produced (even
 * with degraded units), 2 for setup errors, 1 for anything else.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = defaultIO,
  overrides: Partial<ReviewRequest> = {}
): Promise<number> {
  const log = getLogger();
  const controller = new AbortController();
  const onSigint = () => {
    log.warn("Cancellation requested, finishing files already in progress");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout(`${USAGE}\n`);
      return EXIT_OK;
    }

    const report = await reviewRepository({
      root: args.root,
      languages: args.languages,
      configPath: args.config,
      ai: args.ai,
      static: args.static,
      concurrency: args.concurrency,
      signal: controller.signal,
      ...overrides,
    });

    const rendered = renderReport(report, args.format);
    if (args.output) {
      await writeFile(args.output, rendered, "utf-8");
      log.info({ output: args.output, format: args.format }, "Report written");
    } else {
      io.stdout(rendered);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_CONFIG;
    }
    log.fatal({ err }, "Review failed");
    io.stderr(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_FATAL;
  } finally {
    process.off("SIGINT", onSigint);
  }
}
