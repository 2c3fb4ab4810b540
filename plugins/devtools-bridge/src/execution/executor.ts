// Command execution layer: every OS command the bridge issues passes through here.
// Components depend on the Executor interface so tests can substitute scripted results.
import execa from "execa";
import type { Command, DurationCategory } from "../types/command.js";
import { DURATION_TIMEOUTS } from "../types/command.js";
import { CommandFailedError, InsufficientPrivilegeError } from "../errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Exit code reported when the program could not be spawned at all. */
export const SPAWN_FAILED_EXIT_CODE = 127;

export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) throw new Error("Cannot execute an empty command");

    const result = await execa(cmd, args, {
      timeout: timeoutMs,
      reject: false,
      windowsHide: true,
      env: command.env,
      input: command.stdin,
      // 10MB is far above anything netsh or PowerShell print here.
      maxBuffer: 10 * 1024 * 1024,
    });
    const durationMs = Math.round(performance.now() - start);
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : SPAWN_FAILED_EXIT_CODE;
    logger.debug({ argv: command.argv, exitCode, durationMs, timedOut: result.timedOut }, "Command finished");
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode,
      timedOut: result.timedOut,
      durationMs,
    };
  }
}

/** Run a command with the timeout of its duration category. */
export async function run(executor: Executor, command: Command, duration: DurationCategory): Promise<ExecResult> {
  return executor.execute(command, DURATION_TIMEOUTS[duration]);
}

/** Build a PowerShell invocation. Works on Windows and, through interop, from WSL. */
export function powerShell(script: string): Command {
  return { argv: ["powershell.exe", "-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command", script] };
}

/** Execute a PowerShell script string. */
export async function execPowerShell(executor: Executor, script: string, duration: DurationCategory): Promise<ExecResult> {
  return run(executor, powerShell(script), duration);
}

/** Quote a value for a single-quoted PowerShell string literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

const PRIVILEGE_MARKERS = ["access is denied", "permissiondenied", "requires elevation"];

/** Map a failed OS command to the right error kind: missing elevation or plain failure. */
export function commandFailure(action: string, r: ExecResult): CommandFailedError | InsufficientPrivilegeError {
  const output = r.stderr.trim() || r.stdout.trim();
  const lower = output.toLowerCase();
  if (PRIVILEGE_MARKERS.some((marker) => lower.includes(marker))) {
    return new InsufficientPrivilegeError(`${action} was rejected: elevated rights required`, { output });
  }
  return new CommandFailedError(`${action} failed (exit ${r.exitCode}): ${output}`, "Re-run with --verbose to see the full command output.", {
    output,
  });
}
