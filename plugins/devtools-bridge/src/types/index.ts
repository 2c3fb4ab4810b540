export type { Role, Environment, Topology } from "./topology.js";
export type { BrowserName, BrowserProcessSpec, ProcessHandle } from "./browser.js";
export { BROWSERS } from "./browser.js";
export type { FirewallRule, ObservedFirewallRule, RuleState } from "./firewall.js";
export type { BridgeMapping } from "./bridge.js";
export type { CheckOutcome, DiagnosticResult, VerificationTarget } from "./diagnostic.js";
export type { Command, DurationCategory } from "./command.js";
export { DURATION_TIMEOUTS } from "./command.js";
export type { BridgeConfig } from "./config.js";
export { bridgeConfigSchema } from "./config.js";
