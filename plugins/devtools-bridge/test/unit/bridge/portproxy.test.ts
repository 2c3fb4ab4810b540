import { NetshPortProxyTable, PortBridge, parsePortProxyTable } from "../../../src/bridge/portproxy.js";
import { InvalidMappingDirectionError } from "../../../src/errors.js";
import { InMemoryPortProxyTable } from "../../helpers/in-memory.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";

const NETSH_OUTPUT = [
  "",
  "Listen on ipv4:             Connect to ipv4:",
  "",
  "Address         Port        Address         Port",
  "--------------- ----------  --------------- ----------",
  "172.21.208.1    9222        127.0.0.1       9222",
  "0.0.0.0         3000        127.0.0.1       3000",
  "",
].join("\r\n");

describe("parsePortProxyTable", () => {
  it("reads data rows and skips headers", () => {
    expect(parsePortProxyTable(NETSH_OUTPUT)).toEqual([
      { listenAddress: "172.21.208.1", listenPort: 9222, targetAddress: "127.0.0.1", targetPort: 9222 },
      { listenAddress: "0.0.0.0", listenPort: 3000, targetAddress: "127.0.0.1", targetPort: 3000 },
    ]);
  });

  it("returns nothing for an empty table", () => {
    expect(parsePortProxyTable("")).toEqual([]);
  });
});

describe("NetshPortProxyTable", () => {
  it("adds with listen and connect address/port", async () => {
    const executor = new FakeExecutor();
    await new NetshPortProxyTable(executor).add({ listenAddress: "172.21.208.1", listenPort: 9222, targetAddress: "127.0.0.1", targetPort: 9222 });
    expect(executor.commandLines).toEqual([
      "netsh interface portproxy add v4tov4 listenaddress=172.21.208.1 listenport=9222 connectaddress=127.0.0.1 connectport=9222",
    ]);
  });
});

describe("PortBridge", () => {
  const mapping = { listenAddress: "172.21.208.1", listenPort: 9222, targetAddress: "127.0.0.1", targetPort: 9222 };

  it("replaces an existing listener instead of duplicating it", async () => {
    const table = new InMemoryPortProxyTable([{ ...mapping, targetPort: 9333 }]);
    await new PortBridge(table).expose(mapping);
    expect(table.entries).toEqual([mapping]);
  });

  it("is idempotent", async () => {
    const table = new InMemoryPortProxyTable();
    const bridge = new PortBridge(table);
    await bridge.expose(mapping);
    await bridge.expose(mapping);
    expect(table.entries).toEqual([mapping]);
  });

  it("retracts the mapping left by a previous adapter address", async () => {
    const old = { ...mapping, listenAddress: "172.20.160.1" };
    const unrelated = { listenAddress: "0.0.0.0", listenPort: 3000, targetAddress: "127.0.0.1", targetPort: 3000 };
    const table = new InMemoryPortProxyTable([old, unrelated]);

    await new PortBridge(table).expose(mapping);

    expect(table.entries).toEqual([unrelated, mapping]);
  });

  it("never adds a reversed mapping", async () => {
    const table = new InMemoryPortProxyTable();
    await expect(new PortBridge(table).expose({ ...mapping, listenAddress: "127.0.0.1" })).rejects.toBeInstanceOf(
      InvalidMappingDirectionError,
    );
    expect(table.entries).toEqual([]);
  });

  it("retracts only what exists", async () => {
    const table = new InMemoryPortProxyTable([mapping]);
    const bridge = new PortBridge(table);
    expect(await bridge.retract(mapping)).toBe(true);
    expect(await bridge.retract(mapping)).toBe(false);
    expect(await bridge.find(mapping.listenAddress, mapping.listenPort)).toBeNull();
  });
});
