import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Environment, Role, Topology } from "../types/topology.js";
import type { Executor } from "../execution/executor.js";
import { execPowerShell, psQuote, run } from "../execution/executor.js";
import { TopologyUnresolvedError } from "../errors.js";
import { LOOPBACK_ADDRESS, deriveRange16, parseDefaultGateway, parseNameserver } from "./network.js";
import { logger } from "../logger.js";

/** OS-identifying inputs, injectable so tests can impersonate any side. */
export interface ProbeSignals {
  readonly platform: NodeJS.Platform;
  readFile(path: string): string | null;
}

export const systemSignals: ProbeSignals = {
  platform: process.platform,
  readFile: (path) => {
    try {
      return readFileSync(path, "utf-8");
    } catch {
      return null;
    }
  },
};

/** Classify the side of the boundary from kernel/platform markers. */
export function detectEnvironment(signals: ProbeSignals): { role: Role; environment: Environment } {
  switch (signals.platform) {
    case "win32":
      return { role: "host", environment: "windows" };
    case "linux": {
      const version = (signals.readFile("/proc/version") ?? "").toLowerCase();
      if (version.includes("microsoft") || version.includes("wsl")) return { role: "guest", environment: "wsl" };
      return { role: "unknown", environment: "linux" };
    }
    case "darwin":
      return { role: "unknown", environment: "macos" };
    default:
      return { role: "unknown", environment: "unknown" };
  }
}

const adapterRow = z.object({ InterfaceAlias: z.string(), IPAddress: z.string() });
const adapterOutput = z.union([adapterRow, z.array(adapterRow)]);

export interface EnvironmentProbeOptions {
  readonly executor: Executor;
  /** Wildcard alias pattern, e.g. "*WSL*". Matches "vEthernet (WSL)" and newer names alike. */
  readonly adapterPattern: string;
  readonly signals?: ProbeSignals;
}

export class EnvironmentProbe {
  private readonly executor: Executor;
  private readonly adapterPattern: string;
  private readonly signals: ProbeSignals;

  constructor(options: EnvironmentProbeOptions) {
    this.executor = options.executor;
    this.adapterPattern = options.adapterPattern;
    this.signals = options.signals ?? systemSignals;
  }

  /** Side of the boundary only; runs no commands. */
  detect(): { role: Role; environment: Environment } {
    return detectEnvironment(this.signals);
  }

  /** Derive a fresh Topology. Never cached. */
  async probe(): Promise<Topology> {
    const { role, environment } = this.detect();
    logger.debug({ role, environment }, "Environment detected");

    let topology: Topology;
    if (role === "host") topology = await this.probeHost(environment);
    else if (role === "guest") topology = await this.probeGuest(environment);
    else {
      topology = {
        role,
        environment,
        peerAddress: LOOPBACK_ADDRESS,
        peerAddressRange: "127.0.0.0/8",
        adapterName: "loopback",
      };
    }

    logger.info({ topology }, "Topology resolved");
    return Object.freeze(topology);
  }

  private async probeHost(environment: Environment): Promise<Topology> {
    const script =
      `Get-NetIPAddress -InterfaceAlias ${psQuote(this.adapterPattern)} -AddressFamily IPv4 -ErrorAction SilentlyContinue` +
      " | Select-Object InterfaceAlias, IPAddress | ConvertTo-Json -Compress";
    const r = await execPowerShell(this.executor, script, "quick");
    const rows = r.exitCode === 0 ? parseAdapters(r.stdout) : [];
    const first = rows[0];
    if (!first) {
      throw new TopologyUnresolvedError(
        `No IPv4 adapter matching ${this.adapterPattern} was found`,
        "Start WSL (run `wsl` once) so its virtual adapter exists, then re-run.",
        { adapterPattern: this.adapterPattern, stderr: r.stderr.trim() },
      );
    }
    if (rows.length > 1) {
      logger.warn({ adapters: rows.map((row) => row.InterfaceAlias), chosen: first.InterfaceAlias }, "Several adapters match, using the first");
    }
    return {
      role: "host",
      environment,
      peerAddress: first.IPAddress,
      peerAddressRange: deriveRange16(first.IPAddress),
      adapterName: first.InterfaceAlias,
    };
  }

  private async probeGuest(environment: Environment): Promise<Topology> {
    // 1. Default route gateway
    const r = await run(this.executor, { argv: ["ip", "route", "show", "default"] }, "instant");
    let gateway = r.exitCode === 0 ? parseDefaultGateway(r.stdout) : null;
    let adapterName = r.exitCode === 0 ? parseRouteDevice(r.stdout) : null;

    // 2. resolv.conf nameserver, which WSL points at the host
    if (!gateway) {
      const resolv = this.signals.readFile("/etc/resolv.conf");
      gateway = resolv ? parseNameserver(resolv) : null;
      adapterName = null;
    }

    if (!gateway) {
      throw new TopologyUnresolvedError(
        "Could not determine the host address from inside the guest",
        "Check that WSL networking is up (`ip route show default` should list a gateway).",
        { stderr: r.stderr.trim() },
      );
    }
    return {
      role: "guest",
      environment,
      peerAddress: gateway,
      peerAddressRange: deriveRange16(gateway),
      adapterName: adapterName ?? "eth0",
    };
  }
}

function parseAdapters(stdout: string): z.infer<typeof adapterRow>[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch (err) {
    logger.warn({ stdout: trimmed, error: err }, "Get-NetIPAddress printed non-JSON output");
    return [];
  }
  const parsed = adapterOutput.safeParse(json);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, "Unexpected Get-NetIPAddress output");
    return [];
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

function parseRouteDevice(routeOutput: string): string | null {
  const match = routeOutput.match(/^default via \S+ dev (\S+)/m);
  return match?.[1] ?? null;
}
