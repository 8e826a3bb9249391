import { logError } from "./logger";
import { checkRunFreshness, type RunResult } from "./runResult";
import type { SimulationConfig } from "./simConfig";

export type ExportFormat = "pdf" | "txt" | "csv" | "json";

/** Renderers live outside the core and are registered by the host app. */
export interface ReportExporter {
  format: ExportFormat;
  render(result: RunResult): string | Uint8Array;
}

export type ExportOutcome =
  | { status: "ok"; format: ExportFormat; content: string | Uint8Array }
  | { status: "unavailable"; format: ExportFormat; reason: "no_exporter" | "render_failed" }
  | { status: "stale" }
  | { status: "no_results" };

/**
 * Export the latest run. Stale runs are refused. A missing or failing renderer
 * is reported as unavailable; it is never a simulation failure.
 */
export function exportRun(
  result: RunResult | undefined,
  config: SimulationConfig,
  format: ExportFormat,
  exporters: readonly ReportExporter[]
): ExportOutcome {
  const freshness = checkRunFreshness(result, config);
  if (freshness.status !== "current") {
    return { status: freshness.status };
  }

  const exporter = exporters.find((e) => e.format === format);
  if (!exporter) {
    return { status: "unavailable", format, reason: "no_exporter" };
  }

  try {
    return { status: "ok", format, content: exporter.render(freshness.result) };
  } catch (err) {
    logError("[export] renderer failed", format, err);
    return { status: "unavailable", format, reason: "render_failed" };
  }
}
