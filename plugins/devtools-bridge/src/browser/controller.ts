import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import type { BrowserName, BrowserProcessSpec, ProcessHandle } from "../types/browser.js";
import type { Environment } from "../types/topology.js";
import type { Executor } from "../execution/executor.js";
import { run } from "../execution/executor.js";
import { BrowserControlError, BrowserNotFoundError, CommandFailedError } from "../errors.js";
import { retryUntil, type RetryPolicy } from "../retry.js";
import { installPathsFor, loadBrowserCatalog, processNameFor, type BrowserCatalog } from "./catalog.js";
import { logger } from "../logger.js";

/** The slice of ChildProcess the controller touches after spawning. */
export interface SpawnedProcess {
  readonly pid?: number;
  on(event: "error", listener: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export interface BrowserControllerOptions {
  readonly executor: Executor;
  readonly environment: Environment;
  readonly catalog?: BrowserCatalog;
  readonly spawn?: SpawnFn;
  readonly fileExists?: (path: string) => boolean;
  readonly killPolicy?: RetryPolicy;
  readonly env?: NodeJS.ProcessEnv;
}

const DEFAULT_KILL_POLICY: RetryPolicy = { attempts: 3, intervalMs: 500 };

// Chrome binds the debug port to 127.0.0.1 whatever --remote-debugging-address says.
const CHROME_FLAGS = [
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-background-networking",
  "--disable-client-side-phishing-detection",
  "--disable-component-update",
  "--disable-default-apps",
  "--disable-hang-monitor",
  "--disable-popup-blocking",
  "--disable-prompt-on-repost",
  "--disable-sync",
  "--metrics-recording-only",
  "--password-store=basic",
  "--use-mock-keychain",
];

/** Default per-browser profile location. Wiped before every launch. */
export function defaultProfileDirectory(browser: BrowserName): string {
  return join(tmpdir(), `devtools-bridge-${browser}-profile`);
}

/** True when `url` points at the machine-readable /json endpoints of the debug port. */
export function isDebugEndpointTarget(url: string, debugPort: number): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;
  return parsed.port === String(debugPort) && parsed.pathname.startsWith("/json");
}

/** Finds, stops and relaunches the debuggable browser. */
export class BrowserController {
  private readonly executor: Executor;
  private readonly environment: Environment;
  private readonly catalog: BrowserCatalog;
  private readonly spawn: SpawnFn;
  private readonly fileExists: (path: string) => boolean;
  private readonly killPolicy: RetryPolicy;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: BrowserControllerOptions) {
    this.executor = options.executor;
    this.environment = options.environment;
    this.catalog = options.catalog ?? loadBrowserCatalog();
    this.spawn = options.spawn ?? nodeSpawn;
    this.fileExists = options.fileExists ?? existsSync;
    this.killPolicy = options.killPolicy ?? DEFAULT_KILL_POLICY;
    this.env = options.env ?? process.env;
  }

  processName(browser: BrowserName): string {
    return processNameFor(this.catalog, browser, this.environment);
  }

  /** Configured override, then known install paths, then PATH. */
  findExecutable(browser: BrowserName, override: string | null = null): string {
    if (override) {
      if (this.fileExists(override)) return override;
      throw new BrowserNotFoundError(`Configured executable does not exist: ${override}`, { browser, override });
    }

    const candidates = installPathsFor(this.catalog, browser, this.environment, this.env);
    const installed = candidates.find((p) => this.fileExists(p));
    if (installed) return installed;

    const onPath = this.searchPath(this.catalog[browser].commands);
    if (onPath) return onPath;

    throw new BrowserNotFoundError(`Could not find a ${this.catalog[browser].display_name} installation`, {
      browser,
      searched: candidates,
    });
  }

  private searchPath(commands: readonly string[]): string | null {
    const dirs = (this.env.PATH ?? this.env.Path ?? "").split(delimiter).filter(Boolean);
    const suffixes = this.environment === "windows" ? [".exe", ""] : [""];
    for (const command of commands) {
      for (const dir of dirs) {
        for (const suffix of suffixes) {
          const candidate = join(dir, command + suffix);
          if (this.fileExists(candidate)) return candidate;
        }
      }
    }
    return null;
  }

  async isRunning(name: string): Promise<boolean> {
    if (this.environment === "windows") {
      const r = await run(this.executor, { argv: ["tasklist", "/FI", `IMAGENAME eq ${name}`, "/NH", "/FO", "CSV"] }, "quick");
      if (r.exitCode !== 0) {
        throw new CommandFailedError(`tasklist failed: ${r.stderr.trim()}`, "Check that tasklist.exe is available on PATH.");
      }
      return r.stdout.toLowerCase().includes(`"${name.toLowerCase()}"`);
    }
    const r = await run(this.executor, { argv: ["pgrep", "-x", name] }, "instant");
    if (r.exitCode === 0) return true;
    if (r.exitCode === 1) return false;
    throw new CommandFailedError(`pgrep failed: ${r.stderr.trim()}`, "Install procps (pgrep/pkill).");
  }

  /**
   * Force-stop every process with this image name. Nothing running is success.
   * Each attempt first checks whether the processes are already gone.
   */
  async terminateAll(name: string): Promise<void> {
    const gone = await retryUntil(
      this.killPolicy,
      async () => !(await this.isRunning(name)),
      async (attempt) => {
        const argv =
          this.environment === "windows" ? ["taskkill", "/F", "/IM", name, "/T"] : ["pkill", "-9", "-x", name];
        const r = await run(this.executor, { argv }, "quick");
        logger.debug({ name, attempt, exitCode: r.exitCode, stderr: r.stderr.trim() }, "Kill attempt");
      },
    );
    if (!gone) {
      throw new BrowserControlError(
        `${name} is still running after ${this.killPolicy.attempts} kill attempts`,
        `Close ${name} manually (or end it in Task Manager) and re-run.`,
        { name },
      );
    }
    logger.info({ name }, "No browser processes running");
  }

  /** Remove the whole profile directory, not just the lock file. Missing directory is success. */
  async clearProfile(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true, maxRetries: 3, retryDelay: 200 });
    } catch (err) {
      throw new BrowserControlError(
        `Could not remove profile directory ${path}: ${err instanceof Error ? err.message : String(err)}`,
        "Make sure no browser process still holds files in the profile directory.",
        { path },
      );
    }
    logger.info({ path }, "Profile directory cleared");
  }

  buildArgs(spec: BrowserProcessSpec): string[] {
    const base =
      spec.browser === "chrome"
        ? [`--remote-debugging-port=${spec.debugPort}`, `--user-data-dir=${spec.profileDirectory}`, ...CHROME_FLAGS]
        : [`--start-debugger-server=127.0.0.1:${spec.debugPort}`, "--profile", spec.profileDirectory, "--no-remote"];
    return [...base, ...spec.extraFlags, spec.launchTargetURL];
  }

  /**
   * Start the browser detached from this process and return immediately.
   * Readiness is the caller's concern.
   */
  launch(spec: BrowserProcessSpec): ProcessHandle {
    if (isDebugEndpointTarget(spec.launchTargetURL, spec.debugPort)) {
      throw new BrowserControlError(
        `Refusing to open the debug endpoint ${spec.launchTargetURL} as a page`,
        "Set browser.launch_url to a normal page such as about:blank.",
        { launchTargetURL: spec.launchTargetURL },
      );
    }

    const args = this.buildArgs(spec);
    const child = this.spawn(spec.executablePath, args, { detached: true, stdio: "ignore", windowsHide: false });
    child.on("error", (err) => {
      logger.error({ executablePath: spec.executablePath, error: err.message }, "Browser process failed to start");
    });
    child.unref();

    logger.info({ pid: child.pid, executablePath: spec.executablePath, debugPort: spec.debugPort }, "Browser launched");
    return { pid: child.pid, executablePath: spec.executablePath, args };
  }
}
