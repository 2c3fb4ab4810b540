import type { Environment, Role, Topology } from "../types/topology.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import type { BridgeSide } from "../sides/interface.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import { toConnectivityError } from "../verify/verifier.js";
import { makeResult, passed, settle, skipped } from "../verify/result.js";
import { loopbackTarget } from "../sides/local-browser.js";
import { type BridgeError, toBridgeError } from "../errors.js";
import type { OrchestratorState, RunReport, StepRecord, Transition, ValidationReport } from "./types.js";
import { logger } from "../logger.js";

/** The probe surface the orchestrator needs. */
export interface TopologySource {
  detect(): { role: Role; environment: Environment };
  probe(): Promise<Topology>;
}

export type SideFactory = (topology: Topology) => BridgeSide;

const NEXT: Record<OrchestratorState, readonly OrchestratorState[]> = {
  Idle: ["ProbingTopology"],
  ProbingTopology: ["AuthorizingFirewall", "Failed"],
  AuthorizingFirewall: ["ResettingBrowser", "Failed"],
  ResettingBrowser: ["LaunchingBrowser", "Failed"],
  LaunchingBrowser: ["EstablishingBridge", "Failed"],
  EstablishingBridge: ["Verifying", "Failed"],
  Verifying: ["Ready", "Failed"],
  Ready: [],
  Failed: [],
};

type SideStep = "authorizeFirewall" | "resetBrowser" | "launchBrowser" | "establishBridge";

const SIDE_STEPS: ReadonlyArray<readonly [OrchestratorState, SideStep]> = [
  ["AuthorizingFirewall", "authorizeFirewall"],
  ["ResettingBrowser", "resetBrowser"],
  ["LaunchingBrowser", "launchBrowser"],
  ["EstablishingBridge", "establishBridge"],
];

export function endpointURL(target: VerificationTarget): string {
  return `http://${target.address}:${target.port}`;
}

export interface OrchestratorOptions {
  readonly probe: TopologySource;
  readonly createSide: SideFactory;
  readonly verifier: ConnectivityVerifier;
  /** Debug port, used for checks that run before a side exists. */
  readonly port: number;
}

/**
 * Sequences one setup run: strictly ordered, no retries, halts on the first
 * error and always returns a report.
 */
export class Orchestrator {
  private current: OrchestratorState = "Idle";
  private readonly transitions: Transition[] = [];
  private activeSide: BridgeSide | null = null;

  constructor(private readonly options: OrchestratorOptions) {}

  get state(): OrchestratorState {
    return this.current;
  }

  get history(): readonly Transition[] {
    return this.transitions;
  }

  /** Side of the last run, kept so the caller can hold or close its resources. */
  get side(): BridgeSide | null {
    return this.activeSide;
  }

  private transition(to: OrchestratorState): void {
    if (!NEXT[this.current].includes(to)) {
      throw new Error(`Illegal transition ${this.current} -> ${to}`);
    }
    this.transitions.push({ from: this.current, to, at: new Date().toISOString() });
    logger.debug({ from: this.current, to }, "State transition");
    this.current = to;
  }

  async run(): Promise<RunReport> {
    if (this.current !== "Idle") throw new Error(`Orchestrator already ran (state ${this.current})`);

    const steps: StepRecord[] = [];
    const record = (detail: string): void => {
      steps.push({ step: steps.length + 1, state: this.current, detail });
      logger.info({ step: steps.length, state: this.current }, detail);
    };
    let topology: Topology | null = null;
    let results: DiagnosticResult[] = [];

    try {
      this.transition("ProbingTopology");
      topology = await this.options.probe.probe();
      record(`${topology.role} (${topology.environment}), peer ${topology.peerAddress} on ${topology.adapterName}`);

      const side = this.options.createSide(topology);
      this.activeSide = side;

      for (const [state, method] of SIDE_STEPS) {
        this.transition(state);
        record(await side[method]());
      }

      this.transition("Verifying");
      const targets = side.verificationTargets();
      results = await this.options.verifier.verifyAll(targets);
      const failedIndex = results.findIndex((r) => !r.passed);
      const failedTarget = targets[failedIndex];
      const failedResult = results[failedIndex];
      if (failedTarget && failedResult) throw toConnectivityError(failedResult, failedTarget);
      record(`${results.length} endpoint${results.length === 1 ? "" : "s"} reachable`);

      this.transition("Ready");
      return { state: "Ready", topology, steps, results, failedState: null, error: null, endpoints: targets.map(endpointURL) };
    } catch (err) {
      const error: BridgeError = toBridgeError(err);
      const failedState = this.current;
      logger.error({ state: failedState, code: error.code, error: error.message, context: error.context }, "Setup failed");
      this.transition("Failed");
      return { state: "Failed", topology, steps, results, failedState, error, endpoints: [] };
    }
  }

  /** Every check, each independent of the others. Never throws. */
  async diagnose(): Promise<DiagnosticResult[]> {
    const { role, environment } = this.options.probe.detect();
    const results: DiagnosticResult[] = [passed("environment", `${role} (${environment})`)];

    let topology: Topology | null = null;
    try {
      topology = await this.options.probe.probe();
      results.push(passed("topology", `peer ${topology.peerAddress} (${topology.peerAddressRange}) on ${topology.adapterName}`));
    } catch (err) {
      const error = toBridgeError(err);
      results.push(makeResult("topology", "failed", error.message, error.remediation));
    }

    const side = topology === null ? null : this.safeSide(topology);
    if (side) {
      results.push(...(await side.diagnostics()));
      for (const target of side.verificationTargets()) {
        results.push(await this.checkEndpoint(target));
      }
      await side.close();
    } else {
      // Without a topology the loopback endpoint is still worth checking.
      results.push(skipped("side checks", "Topology unresolved"));
      const target = loopbackTarget(this.options.port);
      results.push(await this.checkEndpoint(target));
    }
    return results;
  }

  private async checkEndpoint(target: VerificationTarget): Promise<DiagnosticResult> {
    const checkName = `endpoint ${target.name}`;
    const r = await settle(checkName, () => this.options.verifier.check(target));
    return makeResult(checkName, r.outcome, r.detail, r.remediation);
  }

  /** Short pass/fail: topology resolves and every endpoint answers. */
  async validate(): Promise<ValidationReport> {
    let topology: Topology;
    try {
      topology = await this.options.probe.probe();
    } catch (err) {
      const error = toBridgeError(err);
      return { ok: false, results: [makeResult("topology", "failed", error.message, error.remediation)] };
    }
    const side = this.safeSide(topology);
    if (!side) return { ok: false, results: [makeResult("side", "failed", "Could not set up checks for this side")] };

    const results: DiagnosticResult[] = [];
    for (const target of side.verificationTargets()) {
      results.push(await this.options.verifier.check(target));
    }
    await side.close();
    return { ok: results.every((r) => r.passed), results };
  }

  async cleanup(): Promise<string[]> {
    const topology = await this.options.probe.probe();
    const side = this.options.createSide(topology);
    try {
      return await side.cleanup();
    } finally {
      await side.close();
    }
  }

  private safeSide(topology: Topology): BridgeSide | null {
    try {
      return this.options.createSide(topology);
    } catch (err) {
      logger.error({ error: toBridgeError(err).message }, "Could not create side");
      return null;
    }
  }
}
