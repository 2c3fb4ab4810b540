import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { applyOverrides, cliOptionsSchema, createCli, runCli, type CliOptions, type Runtime } from "../../src/cli.js";
import { DEFAULT_CONFIG } from "../../src/config/loader.js";
import { EnvironmentProbe } from "../../src/environment/probe.js";
import { Orchestrator } from "../../src/orchestrator/orchestrator.js";
import type { BridgeConfig } from "../../src/types/config.js";
import { FakeExecutor } from "../helpers/fake-executor.js";
import { HOST_TOPOLOGY, hostFixture } from "../helpers/host-fixture.js";
import { CHROME_VERSION, type ScriptedReply } from "../helpers/scripted-http.js";

async function parse(args: string[]): Promise<CliOptions> {
  const captured: CliOptions[] = [];
  const program = createCli(async (options) => {
    captured.push(options);
    return 0;
  }).exitOverride();
  program.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  await program.parseAsync(args, { from: "user" });
  const [options] = captured;
  if (!options) throw new Error("action did not run");
  return options;
}

describe("createCli", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("parses flags into typed options", async () => {
    const options = await parse(["--browser", "firefox", "--port", "9333", "--diagnose", "--http-port", "8081"]);
    expect(options).toEqual({
      browser: "firefox",
      port: 9333,
      httpPort: 8081,
      diagnose: true,
      validate: false,
      serve: false,
      test: false,
      detectOnly: false,
      cleanup: false,
      verbose: false,
    });
  });

  it("rejects an unknown browser", async () => {
    await expect(parse(["--browser", "edge"])).rejects.toThrow();
  });

  it("rejects a port outside 1-65535", async () => {
    await expect(parse(["--port", "70000"])).rejects.toThrow();
  });
});

describe("applyOverrides", () => {
  it("puts command-line values over the config file", () => {
    const options = cliOptionsSchema.parse({ browser: "librewolf", port: 9229 });
    const config = applyOverrides(DEFAULT_CONFIG, options);
    expect(config.browser.name).toBe("librewolf");
    expect(config.browser.port).toBe(9229);
    expect(config.browser.launch_url).toBe("about:blank");
    expect(config.serve.http_port).toBe(8080);
  });
});

describe("runCli", () => {
  let tmpDir: string;
  let output: string[];

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "devtools-bridge-cli-"));
    output = [];
    jest.spyOn(console, "log").mockImplementation((line: string) => {
      output.push(line);
    });
    jest.spyOn(console, "error").mockImplementation((line: string) => {
      output.push(line);
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function runtimeWith(reply: (url: string) => ScriptedReply, elevated = true): (config: BridgeConfig) => Runtime {
    return (config) => {
      const fx = hostFixture({ reply, elevated });
      const probe = new EnvironmentProbe({
        executor: new FakeExecutor().when("Get-NetIPAddress", { stdout: '{"InterfaceAlias":"vEthernet (WSL)","IPAddress":"172.21.208.1"}' }),
        adapterPattern: config.network.adapter_pattern,
        signals: { platform: "win32", readFile: () => null },
      });
      const orchestrator = new Orchestrator({ probe, createSide: () => fx.side, verifier: fx.verifier, port: config.browser.port });
      return { config, executor: fx.executor, probe, verifier: fx.verifier, orchestrator };
    };
  }

  function options(flags: Partial<CliOptions>): CliOptions {
    return cliOptionsSchema.parse({ config: path.join(tmpDir, "config.yaml"), ...flags });
  }

  it("exits 0 from --diagnose even when the browser is down", async () => {
    const code = await runCli(options({ diagnose: true }), runtimeWith(() => ({ error: "ECONNREFUSED" })));
    expect(code).toBe(0);
    const text = output.join("\n");
    expect(text).toContain("[Refused] endpoint loopback: connection refused");
    expect(text).toContain("Fix: Nothing listens on 127.0.0.1:9222: launch the browser with remote debugging");
  });

  it("exits 1 from a failed --validate", async () => {
    const code = await runCli(options({ validate: true }), runtimeWith(() => ({ error: "ECONNREFUSED" })));
    expect(code).toBe(1);
    expect(output.at(-1)?.split("\n").at(-1)).toBe("Validation FAILED");
  });

  it("exits with the error kind's code when setup fails", async () => {
    const code = await runCli(options({}), runtimeWith(() => ({ body: CHROME_VERSION }), false));
    expect(code).toBe(3);
  });

  it("prints both endpoints after a successful run", async () => {
    const code = await runCli(options({}), runtimeWith(() => ({ body: CHROME_VERSION })));
    expect(code).toBe(0);
    expect(output.join("\n")).toContain(`Ready. Debug endpoints:\n  http://127.0.0.1:9222\n  http://${HOST_TOPOLOGY.peerAddress}:9222`);
  });
});
