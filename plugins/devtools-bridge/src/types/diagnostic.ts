/** How a single check ended. */
export type CheckOutcome = "success" | "timeout" | "refused" | "no-match" | "failed" | "skipped";

export interface DiagnosticResult {
  readonly checkName: string;
  readonly passed: boolean;
  readonly outcome: CheckOutcome;
  readonly detail: string;
  readonly remediation: string;
}

/** An endpoint the verifier probes. `via` names the target whose traffic this one rides on. */
export interface VerificationTarget {
  readonly name: string;
  readonly kind: "loopback" | "cross-boundary";
  readonly address: string;
  readonly port: number;
  readonly via?: string;
}
