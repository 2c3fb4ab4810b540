// Host-side port bridge over the Windows portproxy table (netsh interface portproxy v4tov4).
import type { BridgeMapping } from "../types/bridge.js";
import type { Executor } from "../execution/executor.js";
import { commandFailure, run } from "../execution/executor.js";
import { createBridgeMapping } from "./mapping.js";
import { logger } from "../logger.js";

/** Raw portproxy entries, unvalidated: the OS table may hold anything. */
export interface PortProxyTable {
  list(): Promise<BridgeMapping[]>;
  add(mapping: BridgeMapping): Promise<void>;
  delete(listenAddress: string, listenPort: number): Promise<void>;
}

const ROW = /^(\S+)\s+(\d+)\s+(\S+)\s+(\d+)\s*$/;

/** Parse `netsh interface portproxy show v4tov4`. Header and separator lines are skipped. */
export function parsePortProxyTable(output: string): BridgeMapping[] {
  const rows: BridgeMapping[] = [];
  for (const line of output.split(/\r?\n/)) {
    const m = ROW.exec(line.trim());
    if (!m) continue;
    const [, listenAddress, listenPort, targetAddress, targetPort] = m;
    if (!listenAddress || !listenPort || !targetAddress || !targetPort) continue;
    rows.push({ listenAddress, listenPort: Number(listenPort), targetAddress, targetPort: Number(targetPort) });
  }
  return rows;
}

export class NetshPortProxyTable implements PortProxyTable {
  constructor(private readonly executor: Executor) {}

  async list(): Promise<BridgeMapping[]> {
    const r = await run(this.executor, { argv: ["netsh", "interface", "portproxy", "show", "v4tov4"] }, "quick");
    if (r.exitCode !== 0) throw commandFailure("netsh portproxy show", r);
    return parsePortProxyTable(r.stdout);
  }

  async add(mapping: BridgeMapping): Promise<void> {
    const argv = [
      "netsh", "interface", "portproxy", "add", "v4tov4",
      `listenaddress=${mapping.listenAddress}`,
      `listenport=${mapping.listenPort}`,
      `connectaddress=${mapping.targetAddress}`,
      `connectport=${mapping.targetPort}`,
    ];
    const r = await run(this.executor, { argv }, "quick");
    if (r.exitCode !== 0) throw commandFailure("netsh portproxy add", r);
  }

  async delete(listenAddress: string, listenPort: number): Promise<void> {
    const argv = ["netsh", "interface", "portproxy", "delete", "v4tov4", `listenaddress=${listenAddress}`, `listenport=${listenPort}`];
    const r = await run(this.executor, { argv }, "quick");
    if (r.exitCode !== 0) throw commandFailure("netsh portproxy delete", r);
  }
}

function sameListener(a: BridgeMapping, listenAddress: string, listenPort: number): boolean {
  return a.listenAddress === listenAddress && a.listenPort === listenPort;
}

export class PortBridge {
  constructor(private readonly table: PortProxyTable) {}

  /**
   * Replace whatever listens on mapping's address:port with mapping.
   * Entries left on the same port by an earlier adapter address, forwarding to
   * the same loopback target, are retracted too.
   */
  async expose(input: BridgeMapping): Promise<void> {
    const mapping = createBridgeMapping(input);
    const existing = await this.table.list();

    for (const entry of existing) {
      const stale =
        entry.listenPort === mapping.listenPort &&
        entry.listenAddress !== mapping.listenAddress &&
        entry.targetAddress === mapping.targetAddress &&
        entry.targetPort === mapping.targetPort;
      if (sameListener(entry, mapping.listenAddress, mapping.listenPort) || stale) {
        await this.table.delete(entry.listenAddress, entry.listenPort);
        logger.info({ entry }, stale ? "Retracted stale port mapping" : "Replaced existing port mapping");
      }
    }

    await this.table.add(mapping);
    logger.info({ mapping }, "Port mapping added");
  }

  /** Returns false when there was nothing to retract. */
  async retract(input: BridgeMapping): Promise<boolean> {
    const mapping = createBridgeMapping(input);
    const existing = await this.table.list();
    if (!existing.some((e) => sameListener(e, mapping.listenAddress, mapping.listenPort))) {
      logger.info({ mapping }, "No port mapping to retract");
      return false;
    }
    await this.table.delete(mapping.listenAddress, mapping.listenPort);
    logger.info({ mapping }, "Port mapping retracted");
    return true;
  }

  async find(listenAddress: string, listenPort: number): Promise<BridgeMapping | null> {
    const existing = await this.table.list();
    return existing.find((e) => sameListener(e, listenAddress, listenPort)) ?? null;
  }
}
