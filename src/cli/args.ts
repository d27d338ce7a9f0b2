import { parseReportFormat, type ReportFormat } from "../report/index.js";
import { ConfigError } from "../utils/errors.js";

export interface CliArgs {
  root: string;
  languages?: string;
  format: ReportFormat;
  output?: string;
  config?: string;
  ai: boolean;
  static: boolean;
  concurrency?: number;
  help: boolean;
}

export const USAGE = `Usage: codereview <root> [options]

Options:
  --root <path>          Source root to review (or pass it as the first argument)
  --language <list>      Comma-separated languages, or "all" (python, javascript, typescript, java, cpp, c)
  --format <format>      Report format: markdown (default) or json
  --output <file>        Write the report to a file instead of stdout
  --config <file>        Config file (default: <root>/.codereview.yml)
  --concurrency <n>      Number of files reviewed in parallel
  --no-ai                Skip the AI reviewer
  --no-static            Skip static analysis tools
  -h, --help             Show this help`;

const VALUE_FLAGS = new Set([
  "--root",
  "--language",
  "--format",
  "--output",
  "--config",
  "--concurrency",
]);

/**
 * @throws ConfigError on unknown flags, missing values or a missing root
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const values = new Map<string, string>();
  const positional: string[] = [];
  let ai = true;
  let staticAnalysis = true;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    if (VALUE_FLAGS.has(flag)) {
      const value = eq > 0 && flag !== arg ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined || value === "") {
        throw new ConfigError(`Missing value for ${flag}`);
      }
      values.set(flag, value);
    } else if (arg === "--no-ai") {
      ai = false;
    } else if (arg === "--no-static") {
      staticAnalysis = false;
    } else if (arg === "-h" || arg === "--help") {
      help = true;
    } else if (arg.startsWith("-")) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const root = values.get("--root") ?? positional[0];
  if (!help && !root) {
    throw new ConfigError("Missing source root");
  }
  if (positional.length > (values.has("--root") ? 0 : 1)) {
    throw new ConfigError(`Unexpected argument: ${positional[positional.length - 1]}`);
  }

  const concurrencyRaw = values.get("--concurrency");
  let concurrency: number | undefined;
  if (concurrencyRaw !== undefined) {
    concurrency = Number(concurrencyRaw);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`--concurrency must be a positive integer, got "${concurrencyRaw}"`);
    }
  }

  return {
    root: root ?? "",
    languages: values.get("--language"),
    format: parseReportFormat(values.get("--format") ?? "markdown"),
    output: values.get("--output"),
    config: values.get("--config"),
    ai,
    static: staticAnalysis,
    concurrency,
    help,
  };
}
