import type { FirewallRule, ObservedFirewallRule, RuleState } from "../types/firewall.js";
import type { Topology } from "../types/topology.js";
import type { FirewallStore } from "./store.js";
import { logger } from "../logger.js";

/** Remote address Windows reports for a rule with no source scope. */
export const UNSCOPED = "Any";

/** The rule this tool owns for a port, scoped to the current peer range. */
export function ruleFor(prefix: string, port: number, topology: Topology): FirewallRule {
  return {
    name: `${prefix}-${port}`,
    allowedPort: port,
    allowedSourceRange: topology.peerAddressRange,
    direction: "inbound",
  };
}

function isUnscoped(rule: ObservedFirewallRule): boolean {
  return rule.remoteAddress.toLowerCase() === UNSCOPED.toLowerCase();
}

function matches(observed: ObservedFirewallRule, wanted: FirewallRule): boolean {
  return (
    observed.direction === "inbound" &&
    observed.action === "allow" &&
    observed.localPort === String(wanted.allowedPort) &&
    observed.remoteAddress === wanted.allowedSourceRange
  );
}

/**
 * Keeps exactly one scoped inbound-allow rule per port.
 * Create if absent, update in place if stale, never duplicate.
 */
export class FirewallRuleManager {
  constructor(private readonly store: FirewallStore) {}

  async reconcile(rule: FirewallRule): Promise<void> {
    const observed = await this.store.listForPort(rule.allowedPort);
    const primary = observed.find((r) => r.name === rule.name);
    // Rules created by hand with our display name but another internal name.
    const duplicates = observed.filter((r) => r.name !== rule.name && r.displayName === rule.name);

    if (!primary) {
      await this.store.create(rule);
      logger.info({ rule }, "Firewall rule created");
    } else if (!matches(primary, rule)) {
      await this.store.update(rule);
      logger.info({ rule, previousRange: primary.remoteAddress }, "Firewall rule rescoped");
    } else {
      logger.info({ rule }, "Firewall rule already current");
    }

    for (const duplicate of duplicates) {
      await this.store.remove(duplicate.name);
      logger.warn({ name: duplicate.name }, "Removed duplicate firewall rule");
    }

    // A scoped rule supersedes any wide-open allow rule left on the same port.
    const legacy = observed.filter(
      (r) => r.name !== rule.name && r.displayName !== rule.name && r.direction === "inbound" && r.action === "allow" && isUnscoped(r),
    );
    for (const r of legacy) {
      await this.store.remove(r.name);
      logger.warn({ name: r.name, displayName: r.displayName }, "Removed legacy unscoped firewall rule");
    }
  }

  async inspect(rule: FirewallRule): Promise<{ state: RuleState; observed: ObservedFirewallRule | null }> {
    const observed = (await this.store.listForPort(rule.allowedPort)).find((r) => r.name === rule.name) ?? null;
    if (!observed) return { state: "missing", observed };
    return { state: matches(observed, rule) ? "current" : "stale", observed };
  }
}
