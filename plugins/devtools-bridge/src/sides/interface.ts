import type { Topology } from "../types/topology.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";

export type SideKind = "host" | "guest" | "local";

/**
 * What one side of the host/guest boundary does at each orchestration step.
 * The orchestrator calls these in order and never branches on the side itself.
 * Step methods return a one-line summary for the progress report.
 */
export interface BridgeSide {
  readonly kind: SideKind;
  readonly topology: Topology;

  authorizeFirewall(): Promise<string>;
  resetBrowser(): Promise<string>;
  launchBrowser(): Promise<string>;
  establishBridge(): Promise<string>;
  verificationTargets(): readonly VerificationTarget[];

  /** Side-specific checks for --diagnose. Never throws. */
  diagnostics(): Promise<DiagnosticResult[]>;
  /** Undo what a run leaves behind. Returns one line per action. */
  cleanup(): Promise<string[]>;
  /** Open a page in the debug browser. False when this side has no browser of its own. */
  openPage(url: string): Promise<boolean>;

  /** True while the side holds something that needs this process alive (the guest relay). */
  readonly holdsProcess: boolean;
  close(): Promise<void>;
}
