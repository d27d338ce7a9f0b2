import pLimit from "p-limit";
import type { Analyzer } from "../analyzers/types.js";
import type { AnalyzerResult, ReviewReport, ReviewUnit, UnitReport } from "./types.js";
import { normalizeFindings } from "./normalizer.js";
import { buildReport, mergeFindings } from "./merge.js";
import { measureUnit } from "./metrics.js";
import { syntheticFinding } from "./synthetic.js";
import { SourceWalker } from "../walker/source-walker.js";
import type { Language } from "../walker/languages.js";
import { errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "orchestrator" });

export interface OrchestrateOptions {
  root: string;
  languages: readonly Language[];
  analyzers: readonly Analyzer[];
  concurrency: number;
  similarityThreshold: number;
  excludePaths?: readonly string[];
  maxFileSizeKB?: number;
  /** Recorded in the report metadata. */
  tools?: Record<string, string>;
  /** Stops dispatching new units; units already started run to completion. */
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * Walks the root, runs every analyzer on each unit across a bounded worker
 * pool, and merges the results into a report. A unit's findings are
 * committed to its slot only once all analyzers for it have settled, so
 * completion order never affects the report.
 */
export async function orchestrateReview(opts: OrchestrateOptions): Promise<ReviewReport> {
  const startTime = Date.now();
  const { signal } = opts;
  const walker = new SourceWalker(opts.root, {
    languages: opts.languages,
    excludePaths: opts.excludePaths,
    maxFileSizeKB: opts.maxFileSizeKB,
  });

  const limit = pLimit(opts.concurrency);
  const slots = new Map<string, UnitReport>();
  const running = new Set<Promise<void>>();
  let cancelled = false;

  const processUnit = async (unit: ReviewUnit): Promise<void> => {
    if (signal?.aborted) {
      cancelled = true;
      log.debug({ path: unit.path }, "Run cancelled, unit not dispatched");
      return;
    }

    const results = await Promise.all(
      opts.analyzers.map((analyzer) => runAnalyzer(analyzer, unit))
    );
    const normalized = normalizeFindings(
      results.flatMap((r) => r.findings),
      unit
    );
    const findings = mergeFindings(normalized, opts.similarityThreshold);
    const assessment = results.find((r) => r.assessment)?.assessment;

    const metrics = measureUnit(unit);

    slots.set(
      unit.path,
      assessment ? { unit, findings, metrics, assessment } : { unit, findings, metrics }
    );
    log.debug(
      { path: unit.path, raw: normalized.length, merged: findings.length },
      "Unit complete"
    );
  };

  for await (const unit of walker) {
    if (signal?.aborted) {
      cancelled = true;
      break;
    }
    const task: Promise<void> = limit(() => processUnit(unit)).then(() => {
      running.delete(task);
    });
    running.add(task);

    // Keep the walker at most one unit ahead of the pool.
    while (running.size > opts.concurrency) {
      await Promise.race(running);
    }
  }
  await Promise.all(running);

  const report = buildReport([...slots.values()], {
    generatedAt: (opts.now ?? (() => new Date()))().toISOString(),
    tools: opts.tools ?? {},
    cancelled,
  });

  const { counts } = report.metadata;
  log.info(
    {
      units: report.units.length,
      errors: counts.error,
      warnings: counts.warning,
      infos: counts.info,
      cancelled,
      durationMs: Date.now() - startTime,
    },
    "Review complete"
  );
  return report;
}

/** Analyzers are contracted not to reject; a rejection is still confined to its unit. */
async function runAnalyzer(analyzer: Analyzer, unit: ReviewUnit): Promise<AnalyzerResult> {
  try {
    return await analyzer.analyze(unit);
  } catch (err) {
    log.error({ err, path: unit.path, analyzer: analyzer.kind }, "Analyzer failed unexpectedly");
    const category = analyzer.kind === "static" ? "tooling-error" : "ai-unavailable";
    return {
      findings: [
        syntheticFinding(category, analyzer.kind, `${analyzer.kind} analyzer failed: ${errorMessage(err)}`),
      ],
    };
  }
}
