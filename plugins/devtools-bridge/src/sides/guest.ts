import type { Topology } from "../types/topology.js";
import type { BridgeConfig } from "../types/config.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import type { Executor } from "../execution/executor.js";
import { execPowerShell, psQuote } from "../execution/executor.js";
import { GuestRelay, type GuestRelayOptions } from "../bridge/relay.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import { makeResult, passed, settle, skipped } from "../verify/result.js";
import { errorForExitCode } from "../errors.js";
import { LOOPBACK_ADDRESS } from "../environment/network.js";
import type { BridgeSide } from "./interface.js";
import { logger } from "../logger.js";

export const CROSS_BOUNDARY_TARGET = "cross-boundary";
export const RELAY_TARGET = "guest-loopback";

export interface GuestSideOptions {
  readonly topology: Topology;
  readonly config: BridgeConfig;
  readonly executor: Executor;
  readonly verifier: ConnectivityVerifier;
  readonly createRelay?: (options: GuestRelayOptions) => GuestRelay;
}

/**
 * WSL side. The host owns the browser and the firewall, so setup is delegated
 * to the host command through Windows interop; the guest only adds the relay.
 */
export class GuestSide implements BridgeSide {
  readonly kind = "guest";
  readonly topology: Topology;
  private readonly config: BridgeConfig;
  private readonly executor: Executor;
  private readonly verifier: ConnectivityVerifier;
  private readonly createRelay: (options: GuestRelayOptions) => GuestRelay;
  private relay: GuestRelay | null = null;

  constructor(options: GuestSideOptions) {
    this.topology = options.topology;
    this.config = options.config;
    this.executor = options.executor;
    this.verifier = options.verifier;
    this.createRelay = options.createRelay ?? ((relayOptions) => new GuestRelay(relayOptions));
  }

  private get port(): number {
    return this.config.browser.port;
  }

  private get peerTarget(): VerificationTarget {
    return { name: CROSS_BOUNDARY_TARGET, kind: "cross-boundary", address: this.topology.peerAddress, port: this.port };
  }

  private relayOptions(): GuestRelayOptions {
    return { listenAddress: LOOPBACK_ADDRESS, listenPort: this.port, targetAddress: this.topology.peerAddress, targetPort: this.port, executor: this.executor };
  }

  /** PowerShell line running the host command and passing its exit code through. */
  hostInvocation(...args: string[]): string {
    return `& ${psQuote(this.config.guest.host_command)} ${args.map(psQuote).join(" ")}; exit $LASTEXITCODE`;
  }

  private async runOnHost(args: string[]): Promise<string> {
    const r = await execPowerShell(this.executor, this.hostInvocation(...args), "slow");
    if (r.exitCode !== 0) {
      const output = r.stderr.trim() || r.stdout.trim();
      throw errorForExitCode(r.exitCode, `Host command failed (exit ${r.exitCode})${output ? `: ${output}` : ""}`, { args });
    }
    return r.stdout;
  }

  async authorizeFirewall(): Promise<string> {
    return "Handled by the host";
  }

  async resetBrowser(): Promise<string> {
    return "Handled by the host";
  }

  async launchBrowser(): Promise<string> {
    const probe = await this.verifier.check(this.peerTarget);
    if (probe.passed) {
      logger.info({ peer: this.topology.peerAddress }, "Host endpoint already reachable, skipping host setup");
      return `Already reachable: ${probe.detail}`;
    }
    logger.info({ outcome: probe.outcome }, "Delegating setup to the host");
    await this.runOnHost(["--browser", this.config.browser.name, "--port", String(this.port)]);
    return `Host setup completed by ${this.config.guest.host_command}`;
  }

  async establishBridge(): Promise<string> {
    if (!this.config.guest.relay) return "Relay disabled";
    const relay = this.createRelay(this.relayOptions());
    await relay.start();
    this.relay = relay;
    return `Relay ${LOOPBACK_ADDRESS}:${this.port} -> ${this.topology.peerAddress}:${this.port}`;
  }

  verificationTargets(): readonly VerificationTarget[] {
    const targets: VerificationTarget[] = [this.peerTarget];
    if (this.config.guest.relay) {
      targets.push({ name: RELAY_TARGET, kind: "loopback", address: LOOPBACK_ADDRESS, port: this.port, via: CROSS_BOUNDARY_TARGET });
    }
    return targets;
  }

  async diagnostics(): Promise<DiagnosticResult[]> {
    const hostCommand = await settle("host command", async () => {
      const script = `(Get-Command ${psQuote(this.config.guest.host_command)} -ErrorAction Stop).Source`;
      const r = await execPowerShell(this.executor, script, "quick");
      if (r.exitCode === 0 && r.stdout.trim()) return passed("host command", r.stdout.trim());
      return makeResult(
        "host command",
        "failed",
        `${this.config.guest.host_command} is not on the Windows PATH`,
        "Install devtools-bridge on Windows or set guest.host_command to its full path.",
      );
    });
    const relay = this.config.guest.relay
      ? passed("relay", `Enabled on ${LOOPBACK_ADDRESS}:${this.port}`)
      : skipped("relay", "Disabled in config");
    return [hostCommand, relay];
  }

  async cleanup(): Promise<string[]> {
    const lines: string[] = [];
    await this.close();
    const evicted = await this.createRelay(this.relayOptions()).evictPriorHolder();
    lines.push(evicted.length > 0 ? `Stopped relay process ${evicted.join(", ")}` : "No relay running");
    await this.runOnHost(["--cleanup", "--browser", this.config.browser.name, "--port", String(this.port)]);
    lines.push("Host cleanup completed");
    return lines;
  }

  async openPage(): Promise<boolean> {
    return false;
  }

  get holdsProcess(): boolean {
    return this.relay?.listening ?? false;
  }

  async close(): Promise<void> {
    const relay = this.relay;
    this.relay = null;
    if (relay) await relay.stop();
  }
}
