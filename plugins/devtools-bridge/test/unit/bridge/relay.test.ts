import { createConnection, createServer, type AddressInfo, type Server } from "node:net";
import { GuestRelay } from "../../../src/bridge/relay.js";
import { CommandFailedError, InvalidMappingDirectionError } from "../../../src/errors.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      resolve(address !== null && typeof address !== "string" ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/** Connect, send one message and resolve with the first chunk echoed back. */
function roundTrip(port: number, message: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host: "127.0.0.1", port }, () => socket.write(message));
    socket.once("data", (data) => {
      resolve(data.toString());
      socket.destroy();
    });
    socket.once("error", reject);
  });
}

describe("GuestRelay", () => {
  let upstream: Server;
  let upstreamPort: number;
  const relays: GuestRelay[] = [];

  beforeAll(async () => {
    upstream = createServer((socket) => socket.pipe(socket));
    upstreamPort = await listen(upstream);
  });

  afterEach(async () => {
    for (const relay of relays.splice(0)) await relay.stop();
  });

  afterAll(async () => {
    await close(upstream);
  });

  function relay(listenPort = 0): GuestRelay {
    const r = new GuestRelay({ listenPort, targetAddress: "127.0.0.1", targetPort: upstreamPort });
    relays.push(r);
    return r;
  }

  it("pipes bytes to the target and back", async () => {
    const address: AddressInfo = await relay().start();
    expect(address.address).toBe("127.0.0.1");
    await expect(roundTrip(address.port, "ping")).resolves.toBe("ping");
  });

  it("serves several connections at once", async () => {
    const { port } = await relay().start();
    const replies = await Promise.all([roundTrip(port, "a"), roundTrip(port, "b"), roundTrip(port, "c")]);
    expect(replies).toEqual(["a", "b", "c"]);
  });

  it("releases the port on stop so a new relay can bind it immediately", async () => {
    const first = relay();
    const { port } = await first.start();
    await roundTrip(port, "hold");
    await first.stop();
    expect(first.listening).toBe(false);

    const second = relay(port);
    const address = await second.start();
    expect(address.port).toBe(port);
    await expect(roundTrip(port, "again")).resolves.toBe("again");
  });

  it("reports a held port as a command failure", async () => {
    const { port } = await relay().start();
    await expect(relay(port).start()).rejects.toBeInstanceOf(CommandFailedError);
  });

  it("refuses to forward a port to itself", () => {
    expect(() => new GuestRelay({ listenPort: 9222, targetAddress: "127.0.0.1", targetPort: 9222 })).toThrow(
      InvalidMappingDirectionError,
    );
  });
});

describe("GuestRelay.evictPriorHolder", () => {
  it("kills the other processes listening on the port", async () => {
    const executor = new FakeExecutor().when("lsof", { stdout: `1234\n${process.pid}\n5678\n` });
    const relay = new GuestRelay({ listenPort: 9222, targetAddress: "172.21.208.1", targetPort: 9222, executor });

    await expect(relay.evictPriorHolder()).resolves.toEqual([1234, 5678]);
    expect(executor.commandLines).toEqual(["lsof -t -iTCP:9222 -sTCP:LISTEN", "kill -9 1234 5678"]);
  });

  it("does nothing when the port is free", async () => {
    const executor = new FakeExecutor().when("lsof", { exitCode: 1 });
    const relay = new GuestRelay({ listenPort: 9222, targetAddress: "172.21.208.1", targetPort: 9222, executor });

    await expect(relay.evictPriorHolder()).resolves.toEqual([]);
    expect(executor.commandLines).toEqual(["lsof -t -iTCP:9222 -sTCP:LISTEN"]);
  });
});
