#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { BROWSERS } from "./types/browser.js";
import type { BridgeConfig } from "./types/config.js";
import type { Topology } from "./types/topology.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor, type Executor } from "./execution/executor.js";
import { EnvironmentProbe } from "./environment/probe.js";
import { BrowserController } from "./browser/controller.js";
import { ConnectivityVerifier } from "./verify/verifier.js";
import { createSide } from "./sides/factory.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import { formatDiagnostics, formatRunReport, formatTopology, formatValidation } from "./orchestrator/report.js";
import { serveTestPage } from "./testpage/server.js";
import { toBridgeError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const parsed = packageSchema.safeParse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));
  return parsed.success ? parsed.data.version : "0.0.0";
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Must be an integer between 1 and 65535.");
  }
  return port;
}

export const cliOptionsSchema = z.object({
  browser: z.enum(BROWSERS).optional(),
  port: z.number().int().optional(),
  httpPort: z.number().int().optional(),
  config: z.string().optional(),
  diagnose: z.boolean().default(false),
  validate: z.boolean().default(false),
  serve: z.boolean().default(false),
  test: z.boolean().default(false),
  detectOnly: z.boolean().default(false),
  cleanup: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function createCli(onRun: (options: CliOptions) => Promise<number>): Command {
  const program = new Command();
  program
    .name("devtools-bridge")
    .description("Expose a browser's remote-debugging port across the Windows/WSL boundary")
    .version(readVersion())
    .addOption(new Option("--browser <name>", "Browser to launch (default from config: chrome)").choices(BROWSERS))
    .option("--port <port>", "Remote-debugging port (default from config: 9222)", parsePort)
    .option("--diagnose", "Run every check and print a breakdown with fixes")
    .option("--validate", "Short pass/fail check; exit 1 on failure")
    .option("--serve", "Serve the static test page")
    .option("--test", "Serve the test page and open it in the debug browser")
    .option("--http-port <port>", "Port for --serve/--test (default from config: 8080)", parsePort)
    .option("--detect-only", "Print the topology and browser executable, then exit")
    .option("--cleanup", "Stop the browser and remove the port mapping")
    .option("--config <path>", "Config file (default ~/.config/devtools-bridge/config.yaml)")
    .option("--verbose", "Debug logging")
    .action(async () => {
      const options = cliOptionsSchema.parse(program.opts());
      process.exitCode = await onRun(options);
    });
  return program;
}

/** Config file values with command-line overrides on top. */
export function applyOverrides(config: BridgeConfig, options: CliOptions): BridgeConfig {
  return {
    ...config,
    browser: { ...config.browser, name: options.browser ?? config.browser.name, port: options.port ?? config.browser.port },
    serve: { ...config.serve, http_port: options.httpPort ?? config.serve.http_port },
  };
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

export interface Runtime {
  readonly config: BridgeConfig;
  readonly executor: Executor;
  readonly probe: EnvironmentProbe;
  readonly verifier: ConnectivityVerifier;
  readonly orchestrator: Orchestrator;
}

export function createRuntime(config: BridgeConfig): Runtime {
  const executor = new LocalExecutor();
  const probe = new EnvironmentProbe({ executor, adapterPattern: config.network.adapter_pattern });
  const verifier = new ConnectivityVerifier({ timeoutMs: config.verify.timeout_ms, retries: config.verify.retries });
  const orchestrator = new Orchestrator({
    probe,
    verifier,
    port: config.browser.port,
    createSide: (topology) => createSide(topology, { config, executor, verifier }),
  });
  return { config, executor, probe, verifier, orchestrator };
}

function browserExecutable(runtime: Runtime, topology: Topology): string | null {
  if (topology.role === "guest") return null;
  const controller = new BrowserController({ executor: runtime.executor, environment: topology.environment });
  return controller.findExecutable(runtime.config.browser.name, runtime.config.browser.executable);
}

async function serve(runtime: Runtime, openInBrowser: boolean): Promise<number> {
  const server = await serveTestPage(runtime.config.serve.http_port);
  try {
    console.log(`Test page: ${server.url}`);
    if (openInBrowser) {
      const topology = await runtime.probe.probe();
      const side = createSide(topology, runtime);
      if (!(await side.openPage(server.url))) console.log(`Open ${server.url} in the debug browser on the host.`);
    }
    console.log("Press Ctrl+C to stop.");
    await waitForSignal();
  } finally {
    await server.close();
  }
  return 0;
}

/** Run one invocation and return the process exit code. */
export async function runCli(options: CliOptions, makeRuntime: (config: BridgeConfig) => Runtime = createRuntime): Promise<number> {
  if (options.verbose) setLogLevel("debug");
  const { config: fileConfig, configPath, firstRun } = loadConfig(options.config ?? process.env.DEVTOOLS_BRIDGE_CONFIG);
  if (firstRun) logger.info({ configPath }, "Wrote default config");
  const runtime = makeRuntime(applyOverrides(fileConfig, options));
  const { orchestrator } = runtime;

  try {
    if (options.serve || options.test) return await serve(runtime, options.test);

    if (options.detectOnly) {
      const topology = await runtime.probe.probe();
      console.log(formatTopology(topology, browserExecutable(runtime, topology)));
      return 0;
    }

    if (options.cleanup) {
      for (const line of await orchestrator.cleanup()) console.log(line);
      return 0;
    }

    if (options.diagnose) {
      console.log(formatDiagnostics(await orchestrator.diagnose()));
      return 0;
    }

    if (options.validate) {
      const report = await orchestrator.validate();
      console.log(formatValidation(report));
      return report.ok ? 0 : 1;
    }

    const report = await orchestrator.run();
    console.log(formatRunReport(report));
    if (report.error) return report.error.exitCode;

    const side = orchestrator.side;
    if (side?.holdsProcess) {
      console.log("Relay running. Press Ctrl+C to stop.");
      await waitForSignal();
      await side.close();
    }
    return 0;
  } catch (err) {
    const error = toBridgeError(err);
    logger.debug({ code: error.code, context: error.context }, "Command failed");
    console.error(`${error.message}\nFix: ${error.remediation}`);
    return error.exitCode;
  }
}

if (require.main === module) {
  createCli((options) => runCli(options))
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
