import type { ReviewReport } from "../review/types.js";
import { ConfigError } from "../utils/errors.js";
import { renderJson } from "./json.js";
import { renderMarkdown } from "./markdown.js";

export const REPORT_FORMATS = ["markdown", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * @throws ConfigError for an unknown format name
 */
export function parseReportFormat(value: string): ReportFormat {
  const normalized = value.trim().toLowerCase();
  if (normalized === "md") return "markdown";
  if (!isReportFormat(normalized)) {
    throw new ConfigError(
      `Unknown report format "${value}". Supported: ${REPORT_FORMATS.join(", ")}`
    );
  }
  return normalized;
}

/** Pure and deterministic: the same report always renders to the same bytes. */
export function renderReport(report: ReviewReport, format: ReportFormat): string {
  switch (format) {
    case "json":
      return renderJson(report);
    case "markdown":
      return renderMarkdown(report);
  }
}
