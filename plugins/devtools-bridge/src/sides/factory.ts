// Picks the BridgeSide for a resolved topology and wires its collaborators.
// Tests construct the sides directly with fakes instead.
import type { Topology } from "../types/topology.js";
import type { BridgeConfig } from "../types/config.js";
import type { Executor } from "../execution/executor.js";
import { BrowserController } from "../browser/controller.js";
import { FirewallRuleManager } from "../firewall/manager.js";
import { WindowsFirewallStore } from "../firewall/store.js";
import { NetshPortProxyTable, PortBridge } from "../bridge/portproxy.js";
import type { ConnectivityVerifier } from "../verify/verifier.js";
import type { BridgeSide } from "./interface.js";
import { HostSide } from "./host.js";
import { GuestSide } from "./guest.js";
import { LocalSide } from "./local.js";
import { logger } from "../logger.js";

export interface SideDependencies {
  readonly config: BridgeConfig;
  readonly executor: Executor;
  readonly verifier: ConnectivityVerifier;
}

export function createSide(topology: Topology, deps: SideDependencies): BridgeSide {
  const { config, executor, verifier } = deps;
  switch (topology.role) {
    case "host":
      return new HostSide({
        topology,
        config,
        executor,
        verifier,
        controller: new BrowserController({ executor, environment: topology.environment }),
        firewall: new FirewallRuleManager(new WindowsFirewallStore(executor)),
        portBridge: new PortBridge(new NetshPortProxyTable(executor)),
      });
    case "guest":
      return new GuestSide({ topology, config, executor, verifier });
    case "unknown":
      logger.info({ environment: topology.environment }, "No host/guest boundary, managing the local browser only");
      return new LocalSide({
        topology,
        config,
        verifier,
        controller: new BrowserController({ executor, environment: topology.environment }),
      });
  }
}
