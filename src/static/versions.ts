import type { StaticToolConfig } from "../config-loader/schema.js";
import type { Language } from "../walker/languages.js";
import { compareStrings } from "../utils/compare.js";
import { createChildLogger } from "../utils/logger.js";
import { runProcess, type ProcessRunner } from "./runner.js";

const log = createChildLogger({ module: "tool-versions" });

const PROBE_TIMEOUT_MS = 10_000;

/**
 * Asks each distinct tool used by `languages` for its version. Keys are the
 * tool commands; a tool that cannot be run reports "unavailable".
 */
export async function probeToolVersions(
  tools: Partial<Record<Language, StaticToolConfig>>,
  languages: readonly Language[],
  runner: ProcessRunner = runProcess
): Promise<Record<string, string>> {
  const byCommand = new Map<string, StaticToolConfig>();
  for (const language of languages) {
    const tool = tools[language];
    if (tool && !byCommand.has(tool.command)) byCommand.set(tool.command, tool);
  }

  const entries = await Promise.all(
    [...byCommand.values()].map(async (tool): Promise<[string, string]> => {
      try {
        const result = await runner(tool.command, tool.versionArgs, {
          timeoutMs: PROBE_TIMEOUT_MS,
        });
        const version = (result.stdout || result.stderr)
          .split(/\r?\n/)
          .map((l) => l.trim())
          .find(Boolean);
        return [tool.command, result.exitCode === 0 && version ? version : "unavailable"];
      } catch (err) {
        log.debug({ tool: tool.command, err }, "Version probe failed");
        return [tool.command, "unavailable"];
      }
    })
  );

  return Object.fromEntries(entries.sort(([a], [b]) => compareStrings(a, b)));
}
