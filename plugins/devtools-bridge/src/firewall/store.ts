// Firewall persistence boundary. FirewallRuleManager speaks only this interface;
// WindowsFirewallStore translates it to NetSecurity cmdlets run through PowerShell.
import { z } from "zod";
import type { FirewallRule, ObservedFirewallRule } from "../types/firewall.js";
import type { Executor } from "../execution/executor.js";
import { commandFailure, execPowerShell, psQuote } from "../execution/executor.js";
import { normalizeRange } from "../environment/network.js";

export interface FirewallStore {
  /** All rules, any direction or name, that open the given local TCP port. */
  listForPort(port: number): Promise<ObservedFirewallRule[]>;
  create(rule: FirewallRule): Promise<void>;
  update(rule: FirewallRule): Promise<void>;
  remove(name: string): Promise<void>;
}

const ruleRow = z.object({
  Name: z.string(),
  DisplayName: z.string(),
  Direction: z.string(),
  Action: z.string(),
  LocalPort: z.union([z.string(), z.number()]),
  RemoteAddress: z.string(),
});
const ruleOutput = z.union([ruleRow, z.array(ruleRow)]);

export class WindowsFirewallStore implements FirewallStore {
  constructor(private readonly executor: Executor) {}

  async listForPort(port: number): Promise<ObservedFirewallRule[]> {
    const script = [
      `Get-NetFirewallPortFilter -Protocol TCP -ErrorAction SilentlyContinue | Where-Object { $_.LocalPort -eq ${psQuote(String(port))} } | ForEach-Object {`,
      "  $rule = $_ | Get-NetFirewallRule;",
      "  $addr = $rule | Get-NetFirewallAddressFilter;",
      "  [pscustomobject]@{ Name = $rule.Name; DisplayName = $rule.DisplayName; Direction = [string]$rule.Direction; Action = [string]$rule.Action; LocalPort = [string]$_.LocalPort; RemoteAddress = (@($addr.RemoteAddress) -join ',') }",
      "} | ConvertTo-Json -Compress",
    ].join(" ");
    const r = await execPowerShell(this.executor, script, "normal");
    if (r.exitCode !== 0) throw commandFailure("Get-NetFirewallRule", r);
    return parseRules(r.stdout);
  }

  async create(rule: FirewallRule): Promise<void> {
    const script =
      `New-NetFirewallRule -Name ${psQuote(rule.name)} -DisplayName ${psQuote(rule.name)} -Direction Inbound -Action Allow` +
      ` -Protocol TCP -LocalPort ${rule.allowedPort} -RemoteAddress ${psQuote(rule.allowedSourceRange)} | Out-Null`;
    const r = await execPowerShell(this.executor, script, "normal");
    if (r.exitCode !== 0) throw commandFailure("New-NetFirewallRule", r);
  }

  async update(rule: FirewallRule): Promise<void> {
    const script =
      `Set-NetFirewallRule -Name ${psQuote(rule.name)} -Direction Inbound -Action Allow -Protocol TCP` +
      ` -LocalPort ${rule.allowedPort} -RemoteAddress ${psQuote(rule.allowedSourceRange)}`;
    const r = await execPowerShell(this.executor, script, "normal");
    if (r.exitCode !== 0) throw commandFailure("Set-NetFirewallRule", r);
  }

  async remove(name: string): Promise<void> {
    const r = await execPowerShell(this.executor, `Remove-NetFirewallRule -Name ${psQuote(name)}`, "normal");
    if (r.exitCode !== 0) throw commandFailure("Remove-NetFirewallRule", r);
  }
}

export function parseRules(stdout: string): ObservedFirewallRule[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];
  const parsed = ruleOutput.parse(JSON.parse(trimmed));
  const rows = Array.isArray(parsed) ? parsed : [parsed];
  return rows.map((row) => ({
    name: row.Name,
    displayName: row.DisplayName,
    direction: row.Direction.toLowerCase() === "outbound" ? "outbound" : "inbound",
    action: row.Action.toLowerCase() === "allow" ? "allow" : "block",
    localPort: String(row.LocalPort),
    remoteAddress: row.RemoteAddress.split(",").map(normalizeRange).join(","),
  }));
}
