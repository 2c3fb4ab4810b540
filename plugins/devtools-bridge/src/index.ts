export * from "./types/index.js";
export * from "./errors.js";
export { loadConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { LocalExecutor, type Executor, type ExecResult } from "./execution/executor.js";
export { EnvironmentProbe, detectEnvironment } from "./environment/probe.js";
export { BrowserController } from "./browser/controller.js";
export { FirewallRuleManager, ruleFor } from "./firewall/manager.js";
export { WindowsFirewallStore, type FirewallStore } from "./firewall/store.js";
export { createBridgeMapping, hostMapping } from "./bridge/mapping.js";
export { PortBridge, NetshPortProxyTable, type PortProxyTable } from "./bridge/portproxy.js";
export { GuestRelay } from "./bridge/relay.js";
export { ConnectivityVerifier } from "./verify/verifier.js";
export type { BridgeSide } from "./sides/interface.js";
export { createSide } from "./sides/factory.js";
export { Orchestrator } from "./orchestrator/orchestrator.js";
export type { OrchestratorState, RunReport } from "./orchestrator/types.js";
export { serveTestPage } from "./testpage/server.js";
