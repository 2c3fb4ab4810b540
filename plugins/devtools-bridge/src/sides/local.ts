import type { Topology } from "../types/topology.js";
import type { BridgeConfig } from "../types/config.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import type { BrowserController } from "../browser/controller.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import type { BridgeSide } from "./interface.js";
import { LocalBrowser, loopbackTarget } from "./local-browser.js";

export interface LocalSideOptions {
  readonly topology: Topology;
  readonly config: BridgeConfig;
  readonly controller: BrowserController;
  readonly verifier: ConnectivityVerifier;
}

/** Native Linux or macOS: no boundary, so only the browser itself is managed. */
export class LocalSide implements BridgeSide {
  readonly kind = "local";
  readonly topology: Topology;
  readonly holdsProcess = false;
  private readonly port: number;
  private readonly browser: LocalBrowser;

  constructor(options: LocalSideOptions) {
    this.topology = options.topology;
    this.port = options.config.browser.port;
    this.browser = new LocalBrowser(options.controller, options.verifier, options.config);
  }

  async authorizeFirewall(): Promise<string> {
    return "Not needed";
  }

  resetBrowser(): Promise<string> {
    return this.browser.reset();
  }

  launchBrowser(): Promise<string> {
    return this.browser.launch();
  }

  async establishBridge(): Promise<string> {
    return "Not needed";
  }

  verificationTargets(): readonly VerificationTarget[] {
    return [loopbackTarget(this.port)];
  }

  async diagnostics(): Promise<DiagnosticResult[]> {
    return [await this.browser.executableCheck()];
  }

  async cleanup(): Promise<string[]> {
    return [await this.browser.stop()];
  }

  async openPage(url: string): Promise<boolean> {
    this.browser.openPage(url);
    return true;
  }

  async close(): Promise<void> {}
}
