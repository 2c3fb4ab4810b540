import type { Topology } from "../types/topology.js";
import type { DiagnosticResult } from "../types/diagnostic.js";
import type { BridgeError } from "../errors.js";

export type OrchestratorState =
  | "Idle"
  | "ProbingTopology"
  | "AuthorizingFirewall"
  | "ResettingBrowser"
  | "LaunchingBrowser"
  | "EstablishingBridge"
  | "Verifying"
  | "Ready"
  | "Failed";

export interface Transition {
  readonly from: OrchestratorState;
  readonly to: OrchestratorState;
  readonly at: string;
}

/** One completed step of the default run, numbered from 1. */
export interface StepRecord {
  readonly step: number;
  readonly state: OrchestratorState;
  readonly detail: string;
}

export interface RunReport {
  readonly state: "Ready" | "Failed";
  readonly topology: Topology | null;
  readonly steps: readonly StepRecord[];
  readonly results: readonly DiagnosticResult[];
  /** State the run was in when it failed. */
  readonly failedState: OrchestratorState | null;
  readonly error: BridgeError | null;
  /** Debug endpoint URLs, one per verification target, when Ready. */
  readonly endpoints: readonly string[];
}

export interface ValidationReport {
  readonly ok: boolean;
  readonly results: readonly DiagnosticResult[];
}
