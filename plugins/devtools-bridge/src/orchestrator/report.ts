// Plain-text reports written to stdout. Logs go to stderr, so these stay pipeable.
import type { CheckOutcome, DiagnosticResult } from "../types/diagnostic.js";
import type { Topology } from "../types/topology.js";
import type { RunReport, ValidationReport } from "./types.js";

const OUTCOME_LABEL: Record<CheckOutcome, string> = {
  success: "OK",
  timeout: "Timeout",
  refused: "Refused",
  "no-match": "No match",
  failed: "Failed",
  skipped: "Skipped",
};

export function outcomeLabel(outcome: CheckOutcome): string {
  return OUTCOME_LABEL[outcome];
}

function resultLine(r: DiagnosticResult): string {
  return `[${outcomeLabel(r.outcome)}] ${r.checkName}: ${r.detail}`;
}

export function formatRunReport(report: RunReport): string {
  const lines: string[] = report.steps.map((s) => `Step ${s.step} (${s.state}): ${s.detail}`);

  if (report.state === "Ready") {
    lines.push("", "Ready. Debug endpoints:", ...report.endpoints.map((url) => `  ${url}`));
    return lines.join("\n");
  }

  const failedStep = report.steps.length + 1;
  lines.push("", `Step ${failedStep} (${report.failedState ?? "unknown"}) failed: ${report.error?.message ?? "unknown error"}`);
  for (const r of report.results.filter((x) => !x.passed)) lines.push(`  ${resultLine(r)}`);
  if (report.error?.remediation) lines.push(`Fix: ${report.error.remediation}`);
  return lines.join("\n");
}

export function formatDiagnostics(results: readonly DiagnosticResult[]): string {
  const lines: string[] = ["Diagnostics", ""];
  for (const r of results) {
    lines.push(resultLine(r));
    if (!r.passed && r.remediation) lines.push(`    Fix: ${r.remediation}`);
  }
  const failing = results.filter((r) => !r.passed && r.outcome !== "skipped").length;
  lines.push("", failing === 0 ? `All ${results.length} checks passed.` : `${failing} of ${results.length} checks failed.`);
  return lines.join("\n");
}

export function formatValidation(report: ValidationReport): string {
  const lines = report.results.map(resultLine);
  lines.push(report.ok ? "Validation PASSED" : "Validation FAILED");
  return lines.join("\n");
}

export function formatTopology(topology: Topology, executable: string | null): string {
  return [
    `Role:         ${topology.role}`,
    `Environment:  ${topology.environment}`,
    `Adapter:      ${topology.adapterName}`,
    `Peer address: ${topology.peerAddress}`,
    `Peer range:   ${topology.peerAddressRange}`,
    `Browser:      ${executable ?? "not managed on this side"}`,
  ].join("\n");
}
