/** Scoped inbound-allow rule. Identity is the name. */
export interface FirewallRule {
  readonly name: string;
  readonly allowedPort: number;
  /** CIDR, or "Any" for an unscoped rule. */
  readonly allowedSourceRange: string;
  readonly direction: "inbound";
}

/** A rule as the OS reports it, which may be outbound, blocking, or unscoped. */
export interface ObservedFirewallRule {
  readonly name: string;
  readonly displayName: string;
  readonly direction: "inbound" | "outbound";
  readonly action: "allow" | "block";
  readonly localPort: string;
  readonly remoteAddress: string;
}

export type RuleState = "missing" | "current" | "stale";
