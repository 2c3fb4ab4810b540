// Browser lifecycle shared by every side that runs the browser itself (host and native).
import type { BridgeConfig } from "../types/config.js";
import type { BrowserProcessSpec } from "../types/browser.js";
import type { DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import type { BrowserController } from "../browser/controller.js";
import { defaultProfileDirectory } from "../browser/controller.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import { toConnectivityError } from "../verify/verifier.js";
import { passed, settle } from "../verify/result.js";
import { LOOPBACK_ADDRESS } from "../environment/network.js";

export const LOOPBACK_TARGET = "loopback";

export function loopbackTarget(port: number): VerificationTarget {
  return { name: LOOPBACK_TARGET, kind: "loopback", address: LOOPBACK_ADDRESS, port };
}

export class LocalBrowser {
  constructor(
    private readonly controller: BrowserController,
    private readonly verifier: ConnectivityVerifier,
    private readonly config: BridgeConfig,
  ) {}

  get profileDirectory(): string {
    return this.config.browser.profile_dir ?? defaultProfileDirectory(this.config.browser.name);
  }

  async reset(): Promise<string> {
    const name = this.controller.processName(this.config.browser.name);
    await this.controller.terminateAll(name);
    await this.controller.clearProfile(this.profileDirectory);
    return `Stopped ${name} and cleared ${this.profileDirectory}`;
  }

  spec(launchTargetURL: string = this.config.browser.launch_url): BrowserProcessSpec {
    const { browser } = this.config;
    return {
      browser: browser.name,
      executablePath: this.controller.findExecutable(browser.name, browser.executable),
      profileDirectory: this.profileDirectory,
      debugPort: browser.port,
      extraFlags: browser.extra_flags,
      launchTargetURL,
    };
  }

  /** Launch, then poll the loopback endpoint until the browser answers. */
  async launch(): Promise<string> {
    const handle = this.controller.launch(this.spec());
    const target = loopbackTarget(this.config.browser.port);
    const ready = await this.verifier.waitForReady(target, {
      attempts: this.config.browser.ready_attempts,
      intervalMs: this.config.browser.ready_interval_ms,
    });
    if (!ready.passed) throw toConnectivityError(ready, target);
    return `Launched ${handle.executablePath} (pid ${handle.pid ?? "unknown"}): ${ready.detail}`;
  }

  async stop(): Promise<string> {
    const name = this.controller.processName(this.config.browser.name);
    await this.controller.terminateAll(name);
    return `Stopped ${name}`;
  }

  openPage(url: string): void {
    this.controller.launch(this.spec(url));
  }

  executableCheck(): Promise<DiagnosticResult> {
    return settle("browser executable", async () => passed("browser executable", this.spec().executablePath));
  }
}
