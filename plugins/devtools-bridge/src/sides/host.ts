import type { Topology } from "../types/topology.js";
import type { FirewallRule } from "../types/firewall.js";
import type { BridgeConfig } from "../types/config.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import type { Executor } from "../execution/executor.js";
import { execPowerShell } from "../execution/executor.js";
import type { BrowserController } from "../browser/controller.js";
import type { FirewallRuleManager } from "../firewall/manager.js";
import { ruleFor } from "../firewall/manager.js";
import type { PortBridge } from "../bridge/portproxy.js";
import { hostMapping } from "../bridge/mapping.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import { makeResult, passed, settle } from "../verify/result.js";
import { ELEVATION_REMEDIATION, InsufficientPrivilegeError } from "../errors.js";
import type { BridgeSide } from "./interface.js";
import { LOOPBACK_TARGET, LocalBrowser, loopbackTarget } from "./local-browser.js";
import { logger } from "../logger.js";

const IS_ADMIN_SCRIPT =
  "([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent())" +
  ".IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)";

export interface HostSideOptions {
  readonly topology: Topology;
  readonly config: BridgeConfig;
  readonly executor: Executor;
  readonly controller: BrowserController;
  readonly firewall: FirewallRuleManager;
  readonly portBridge: PortBridge;
  readonly verifier: ConnectivityVerifier;
}

/** Windows side: owns the browser, the firewall rule and the portproxy mapping. */
export class HostSide implements BridgeSide {
  readonly kind = "host";
  readonly topology: Topology;
  readonly holdsProcess = false;
  private readonly config: BridgeConfig;
  private readonly executor: Executor;
  private readonly firewall: FirewallRuleManager;
  private readonly portBridge: PortBridge;
  private readonly browser: LocalBrowser;

  constructor(options: HostSideOptions) {
    this.topology = options.topology;
    this.config = options.config;
    this.executor = options.executor;
    this.firewall = options.firewall;
    this.portBridge = options.portBridge;
    this.browser = new LocalBrowser(options.controller, options.verifier, options.config);
  }

  private get port(): number {
    return this.config.browser.port;
  }

  private get rule(): FirewallRule {
    return ruleFor(this.config.network.firewall_rule_prefix, this.port, this.topology);
  }

  async isElevated(): Promise<boolean> {
    const r = await execPowerShell(this.executor, IS_ADMIN_SCRIPT, "quick");
    return r.exitCode === 0 && r.stdout.trim().toLowerCase() === "true";
  }

  async authorizeFirewall(): Promise<string> {
    if (!(await this.isElevated())) {
      throw new InsufficientPrivilegeError("Creating the firewall rule and port mapping needs Administrator rights");
    }
    const rule = this.rule;
    await this.firewall.reconcile(rule);
    return `Firewall rule ${rule.name} allows TCP ${rule.allowedPort} from ${rule.allowedSourceRange}`;
  }

  resetBrowser(): Promise<string> {
    return this.browser.reset();
  }

  launchBrowser(): Promise<string> {
    return this.browser.launch();
  }

  async establishBridge(): Promise<string> {
    const mapping = hostMapping(this.topology.peerAddress, this.port);
    await this.portBridge.expose(mapping);
    return `${mapping.listenAddress}:${mapping.listenPort} -> ${mapping.targetAddress}:${mapping.targetPort}`;
  }

  verificationTargets(): readonly VerificationTarget[] {
    return [
      loopbackTarget(this.port),
      { name: "cross-boundary", kind: "cross-boundary", address: this.topology.peerAddress, port: this.port, via: LOOPBACK_TARGET },
    ];
  }

  async diagnostics(): Promise<DiagnosticResult[]> {
    const results = [await this.browser.executableCheck()];

    results.push(
      await settle("elevation", async () =>
        (await this.isElevated())
          ? passed("elevation", "Running as Administrator")
          : makeResult("elevation", "failed", "Not running as Administrator", ELEVATION_REMEDIATION),
      ),
    );

    results.push(
      await settle("firewall rule", async () => {
        const rule = this.rule;
        const { state, observed } = await this.firewall.inspect(rule);
        if (state === "current") return passed("firewall rule", `${rule.name} allows ${rule.allowedSourceRange}`);
        const detail =
          state === "missing" ? `No rule named ${rule.name}` : `${rule.name} allows ${observed?.remoteAddress ?? "?"}, expected ${rule.allowedSourceRange}`;
        return makeResult("firewall rule", "failed", detail, "Run devtools-bridge elevated to create or rescope the rule.");
      }),
    );

    results.push(
      await settle("port mapping", async () => {
        const found = await this.portBridge.find(this.topology.peerAddress, this.port);
        if (found) return passed("port mapping", `${found.listenAddress}:${found.listenPort} -> ${found.targetAddress}:${found.targetPort}`);
        return makeResult(
          "port mapping",
          "failed",
          `No portproxy entry listens on ${this.topology.peerAddress}:${this.port}`,
          "Run devtools-bridge elevated to add the port mapping.",
        );
      }),
    );
    return results;
  }

  async cleanup(): Promise<string[]> {
    const lines = [await this.browser.stop()];
    if (!(await this.isElevated())) {
      logger.warn("Not elevated, leaving the port mapping in place");
      lines.push("Port mapping left in place: removing it needs Administrator rights");
      return lines;
    }
    const mapping = hostMapping(this.topology.peerAddress, this.port);
    const removed = await this.portBridge.retract(mapping);
    lines.push(
      removed
        ? `Removed port mapping ${mapping.listenAddress}:${mapping.listenPort}`
        : `No port mapping on ${mapping.listenAddress}:${mapping.listenPort}`,
    );
    return lines;
  }

  async openPage(url: string): Promise<boolean> {
    this.browser.openPage(url);
    return true;
  }

  async close(): Promise<void> {}
}
