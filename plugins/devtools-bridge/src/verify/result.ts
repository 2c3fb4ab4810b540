import type { CheckOutcome, DiagnosticResult } from "../types/diagnostic.js";
import { toBridgeError } from "../errors.js";
import { logger } from "../logger.js";

export function makeResult(checkName: string, outcome: CheckOutcome, detail: string, remediation = ""): DiagnosticResult {
  return Object.freeze({ checkName, passed: outcome === "success", outcome, detail, remediation });
}

export function passed(checkName: string, detail: string): DiagnosticResult {
  return makeResult(checkName, "success", detail);
}

export function skipped(checkName: string, detail: string): DiagnosticResult {
  return makeResult(checkName, "skipped", detail);
}

/** Run one diagnostic check; anything it throws becomes a failed result carrying the error's remediation. */
export async function settle(checkName: string, check: () => Promise<DiagnosticResult>): Promise<DiagnosticResult> {
  try {
    return await check();
  } catch (err) {
    const error = toBridgeError(err);
    logger.debug({ checkName, code: error.code, error: error.message }, "Check failed");
    return makeResult(checkName, "failed", error.message, error.remediation);
  }
}
