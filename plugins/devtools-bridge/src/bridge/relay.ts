// Guest-side byte relay: guest loopback:port → host peer:port.
// One piped socket pair per accepted connection; no protocol awareness.
import { createConnection, createServer, type AddressInfo, type Server, type Socket } from "node:net";
import type { Executor } from "../execution/executor.js";
import { run } from "../execution/executor.js";
import { CommandFailedError, InvalidMappingDirectionError } from "../errors.js";
import { LOOPBACK_ADDRESS, isLoopback } from "../environment/network.js";
import { logger } from "../logger.js";

export interface GuestRelayOptions {
  readonly listenAddress?: string;
  readonly listenPort: number;
  readonly targetAddress: string;
  readonly targetPort: number;
  /** Used to evict an earlier relay process holding the port. Omit to skip eviction. */
  readonly executor?: Executor;
}

export class GuestRelay {
  private server: Server | null = null;
  private readonly connections = new Set<Socket>();
  private readonly listenAddress: string;
  private readonly listenPort: number;
  private readonly targetAddress: string;
  private readonly targetPort: number;
  private readonly executor?: Executor;

  constructor(options: GuestRelayOptions) {
    this.listenAddress = options.listenAddress ?? LOOPBACK_ADDRESS;
    this.listenPort = options.listenPort;
    this.targetAddress = options.targetAddress;
    this.targetPort = options.targetPort;
    this.executor = options.executor;
    if (isLoopback(this.targetAddress) && this.targetPort === this.listenPort) {
      throw new InvalidMappingDirectionError(
        `Relay would forward ${this.listenAddress}:${this.listenPort} to itself`,
        { targetAddress: this.targetAddress, targetPort: this.targetPort },
      );
    }
  }

  /** Kill whatever other process listens on the relay port (an earlier relay). */
  async evictPriorHolder(): Promise<number[]> {
    if (!this.executor) return [];
    const r = await run(this.executor, { argv: ["lsof", "-t", `-iTCP:${this.listenPort}`, "-sTCP:LISTEN"] }, "instant");
    if (r.exitCode !== 0) {
      // lsof exits 1 when nothing matches
      if (r.exitCode !== 1) logger.warn({ exitCode: r.exitCode, stderr: r.stderr.trim() }, "lsof unavailable, not evicting");
      return [];
    }
    const pids = r.stdout
      .split(/\s+/)
      .map(Number)
      .filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== process.pid);
    if (pids.length === 0) return [];
    const kill = await run(this.executor, { argv: ["kill", "-9", ...pids.map(String)] }, "instant");
    if (kill.exitCode !== 0) {
      throw new CommandFailedError(
        `Could not stop the process holding port ${this.listenPort}: ${kill.stderr.trim()}`,
        `Stop the process listening on ${this.listenPort} (sudo kill ${pids.join(" ")}) and re-run.`,
        { pids },
      );
    }
    logger.info({ pids, port: this.listenPort }, "Evicted previous listener");
    return pids;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) throw new Error("Relay already started");
    await this.evictPriorHolder();

    const server = createServer((inbound) => this.forward(inbound));
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      // Node listening sockets set SO_REUSEADDR, so a restart can rebind while old connections sit in TIME_WAIT.
      server.listen(this.listenPort, this.listenAddress, () => {
        server.off("error", reject);
        resolve();
      });
    }).catch((err: NodeJS.ErrnoException) => {
      throw new CommandFailedError(
        `Relay could not listen on ${this.listenAddress}:${this.listenPort}: ${err.message}`,
        `Free port ${this.listenPort} or disable guest.relay in the config file.`,
        { code: err.code },
      );
    });
    server.on("error", (err) => logger.error({ error: err.message }, "Relay listener error"));
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("Relay bound to a non-TCP address");
    logger.info({ listen: `${address.address}:${address.port}`, target: `${this.targetAddress}:${this.targetPort}` }, "Relay listening");
    return address;
  }

  private forward(inbound: Socket): void {
    const outbound = createConnection({ host: this.targetAddress, port: this.targetPort });
    this.connections.add(inbound);
    this.connections.add(outbound);

    inbound.pipe(outbound);
    outbound.pipe(inbound);

    const cleanup = () => {
      inbound.destroy();
      outbound.destroy();
      this.connections.delete(inbound);
      this.connections.delete(outbound);
    };
    inbound.on("error", (err) => logger.debug({ error: err.message }, "Relay inbound socket error"));
    outbound.on("error", (err) => logger.debug({ error: err.message }, "Relay outbound socket error"));
    inbound.on("close", cleanup);
    outbound.on("close", cleanup);
  }

  get activeConnections(): number {
    return this.connections.size / 2;
  }

  get listening(): boolean {
    return this.server !== null;
  }

  /** Drop every piped connection and release the port. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.connections) socket.destroy();
    this.connections.clear();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    logger.info({ port: this.listenPort }, "Relay stopped");
  }
}
