import type { Analyzer } from "../analyzers/types.js";
import type { StaticToolConfig } from "../config-loader/schema.js";
import type { AnalyzerResult, ReviewUnit } from "../review/types.js";
import { syntheticFinding } from "../review/synthetic.js";
import type { Language } from "../walker/languages.js";
import { ToolingError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { parseDiagnostics } from "./diagnostics.js";
import { runProcess, type ProcessResult, type ProcessRunner } from "./runner.js";

const log = createChildLogger({ module: "static-adapter" });

export interface StaticAnalyzerOptions {
  tools: Partial<Record<Language, StaticToolConfig>>;
  timeoutMs: number;
  runner?: ProcessRunner;
}

export function createStaticAnalyzer(opts: StaticAnalyzerOptions): Analyzer {
  const runner = opts.runner ?? runProcess;
  const patterns = new Map<Language, RegExp>();

  const patternFor = (language: Language, tool: StaticToolConfig): RegExp => {
    let pattern = patterns.get(language);
    if (!pattern) {
      pattern = new RegExp(tool.pattern);
      patterns.set(language, pattern);
    }
    return pattern;
  };

  return {
    kind: "static",
    async analyze(unit: ReviewUnit): Promise<AnalyzerResult> {
      const tool = opts.tools[unit.language];
      if (!tool) {
        log.debug({ path: unit.path, language: unit.language }, "No static tool configured");
        return { findings: [] };
      }

      const args = tool.args.map((a) => a.replaceAll("{file}", unit.absolutePath));
      let result: ProcessResult;
      try {
        result = await runner(tool.command, args, { timeoutMs: opts.timeoutMs });
      } catch (err) {
        if (!(err instanceof ToolingError)) throw err;
        log.warn({ path: unit.path, tool: tool.command, reason: err.reason }, err.message);
        return {
          findings: [syntheticFinding("tooling-error", "static", err.message)],
        };
      }

      const output = [result.stdout, result.stderr].filter(Boolean).join("\n");
      const { findings, dropped } = parseDiagnostics(
        output,
        patternFor(unit.language, tool),
        unit.path
      );
      if (dropped > 0) {
        log.debug(
          { path: unit.path, tool: tool.command, dropped },
          "Dropped unparsable tool output lines"
        );
      }

      if (result.exitCode !== 0 && findings.length === 0 && output.trim() !== "") {
        const detail = firstLine(result.stderr) || firstLine(result.stdout);
        const exit = result.exitCode === null ? "a signal" : `code ${result.exitCode}`;
        const message = `${tool.command} exited with ${exit}: ${detail}`;
        log.warn({ path: unit.path, tool: tool.command, exitCode: result.exitCode }, message);
        return { findings: [syntheticFinding("tooling-error", "static", message)] };
      }

      log.debug(
        { path: unit.path, tool: tool.command, findings: findings.length },
        "Static analysis complete"
      );
      return { findings };
    },
  };
}

function firstLine(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map((l) => l.trim())
      .find(Boolean) ?? ""
  );
}
