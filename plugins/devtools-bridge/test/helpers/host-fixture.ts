import os from "node:os";
import path from "node:path";
import { BrowserController, type SpawnFn } from "../../src/browser/controller.js";
import { FirewallRuleManager } from "../../src/firewall/manager.js";
import { PortBridge } from "../../src/bridge/portproxy.js";
import { ConnectivityVerifier } from "../../src/verify/verifier.js";
import { HostSide } from "../../src/sides/host.js";
import { DEFAULT_CONFIG } from "../../src/config/loader.js";
import type { BridgeConfig } from "../../src/types/config.js";
import type { Topology } from "../../src/types/topology.js";
import { FakeExecutor } from "./fake-executor.js";
import { InMemoryFirewallStore, InMemoryPortProxyTable } from "./in-memory.js";
import { scriptedClient, type ScriptedReply } from "./scripted-http.js";

export const CHROME_PATH = "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe";

export const HOST_TOPOLOGY: Topology = {
  role: "host",
  environment: "windows",
  peerAddress: "172.21.208.1",
  peerAddressRange: "172.21.0.0/16",
  adapterName: "vEthernet (WSL)",
};

export function testConfig(): BridgeConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.browser.profile_dir = path.join(os.tmpdir(), `devtools-bridge-test-profile-${process.pid}`);
  config.browser.ready_attempts = 2;
  config.browser.ready_interval_ms = 0;
  config.verify.retries = 0;
  return config;
}

export interface HostFixtureOptions {
  readonly elevated?: boolean;
  readonly reply: (url: string) => ScriptedReply;
  readonly topology?: Topology;
}

/** A HostSide wired to fakes: scripted commands, in-memory firewall and portproxy, no network. */
export function hostFixture(options: HostFixtureOptions) {
  const executor = new FakeExecutor()
    .when("IsInRole", { stdout: options.elevated === false ? "False\r\n" : "True\r\n" })
    .on((argv) => (argv[0] === "tasklist" ? { stdout: "INFO: No tasks are running which match the specified criteria.\r\n" } : undefined));
  const store = new InMemoryFirewallStore();
  const table = new InMemoryPortProxyTable();
  const launches: string[][] = [];
  const spawn: SpawnFn = (_command, args) => {
    launches.push([...args]);
    return { pid: 4242, on: () => undefined, unref: () => undefined };
  };
  const controller = new BrowserController({
    executor,
    environment: "windows",
    spawn,
    env: {},
    fileExists: (p) => p === CHROME_PATH,
    killPolicy: { attempts: 2, intervalMs: 0 },
  });
  const { client, urls } = scriptedClient(options.reply);
  const config = testConfig();
  const verifier = new ConnectivityVerifier({ client, retries: config.verify.retries, timeoutMs: 1000 });
  const side = new HostSide({
    topology: options.topology ?? HOST_TOPOLOGY,
    config,
    executor,
    controller,
    verifier,
    firewall: new FirewallRuleManager(store),
    portBridge: new PortBridge(table),
  });
  return { side, executor, store, table, launches, urls, verifier, config };
}
