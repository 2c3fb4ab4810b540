import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { CheckOutcome, DiagnosticResult, VerificationTarget } from "../types/diagnostic.js";
import {
  type BridgeError,
  CommandFailedError,
  ConnectivityRefusedError,
  ConnectivityTimeoutError,
  VerifierInconsistencyError,
} from "../errors.js";
import { sleep, type RetryPolicy } from "../retry.js";
import { makeResult } from "./result.js";
import { logger } from "../logger.js";

export const DEFAULT_CHECK_TIMEOUT_MS = 5000;

const versionPayload = z.object({ Browser: z.string() }).passthrough();

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

/**
 * Sort a failed request: running out the bound is a timeout (dropped), any
 * faster transport failure is refused. Only non-transport errors are failed.
 */
export function classifyFailure(err: unknown): Exclude<CheckOutcome, "success" | "no-match" | "skipped"> {
  if (!axios.isAxiosError(err)) return "failed";
  return err.code && TIMEOUT_CODES.has(err.code) ? "timeout" : "refused";
}

function endpoint(target: VerificationTarget): string {
  return `${target.address}:${target.port}`;
}

export function remediationFor(outcome: CheckOutcome, target: VerificationTarget, timeoutMs: number): string {
  const at = endpoint(target);
  switch (outcome) {
    case "success":
    case "skipped":
      return "";
    case "timeout":
      return target.kind === "loopback"
        ? `The browser accepted ${at} but did not answer within ${timeoutMs} ms; restart it with devtools-bridge.`
        : `Traffic to ${at} is being dropped, most likely by the host firewall; re-run devtools-bridge elevated on the host so the inbound rule for port ${target.port} is created or rescoped.`;
    case "refused":
      return target.kind === "loopback"
        ? `Nothing listens on ${at}: launch the browser with remote debugging on port ${target.port} (run devtools-bridge without --diagnose).`
        : `${at} refused or could not route the connection: the port mapping is missing or the browser is not running; re-run devtools-bridge on the host.`;
    case "no-match":
      return `${at} answers HTTP but is not a DevTools endpoint; another program holds port ${target.port}, choose a different --port.`;
    case "failed":
      return `Checking ${at} failed before any connection was made; re-run with --verbose for details.`;
  }
}

/** Turn a failed check into the error the orchestrator halts with. */
export function toConnectivityError(result: DiagnosticResult, target: VerificationTarget): BridgeError {
  const context = { target: target.name, address: target.address, port: target.port };
  switch (result.outcome) {
    case "timeout":
      return new ConnectivityTimeoutError(`${target.name}: ${result.detail}`, result.remediation, context);
    case "refused":
      return new ConnectivityRefusedError(`${target.name}: ${result.detail}`, result.remediation, context);
    default:
      return new CommandFailedError(`${target.name}: ${result.detail}`, result.remediation, context);
  }
}

export interface ConnectivityVerifierOptions {
  readonly timeoutMs?: number;
  /** Re-checks of a failed target; clamped to 0..1. */
  readonly retries?: number;
  readonly client?: AxiosInstance;
}

/** Bounded-time probes of the /json/version debug endpoint. */
export class ConnectivityVerifier {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly client: AxiosInstance;

  constructor(options: ConnectivityVerifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
    this.retries = Math.min(Math.max(options.retries ?? 1, 0), 1);
    this.client = options.client ?? axios.create();
  }

  async check(target: VerificationTarget, timeoutMs: number = this.timeoutMs): Promise<DiagnosticResult> {
    const url = `http://${endpoint(target)}/json/version`;
    const started = Date.now();
    try {
      const response = await this.client.get<unknown>(url, {
        timeout: timeoutMs,
        // The timer alone leaves a stalled socket open; the signal destroys it.
        signal: AbortSignal.timeout(timeoutMs),
        proxy: false,
        validateStatus: () => true,
      });
      const payload = versionPayload.safeParse(response.data);
      if (!payload.success) {
        logger.debug({ url, status: response.status }, "Endpoint answered without a Browser field");
        return makeResult(
          target.name,
          "no-match",
          `HTTP ${response.status} from ${url} without a Browser field`,
          remediationFor("no-match", target, timeoutMs),
        );
      }
      logger.debug({ url, browser: payload.data.Browser }, "Endpoint reachable");
      return makeResult(target.name, "success", `${payload.data.Browser} at ${endpoint(target)}`, "");
    } catch (err) {
      const outcome = classifyFailure(err);
      const elapsed = Date.now() - started;
      const detail =
        outcome === "timeout"
          ? `no answer from ${url} within ${timeoutMs} ms`
          : `${outcome === "refused" ? "connection refused" : "request failed"} after ${elapsed} ms: ${err instanceof Error ? err.message : String(err)}`;
      logger.debug({ url, outcome, elapsed }, "Endpoint check failed");
      return makeResult(target.name, outcome, detail, remediationFor(outcome, target, timeoutMs));
    }
  }

  /**
   * Check every target in order, re-checking a failure at most once.
   * A target riding on another (`via`) cannot pass while that one fails.
   */
  async verifyAll(targets: readonly VerificationTarget[]): Promise<DiagnosticResult[]> {
    const results: DiagnosticResult[] = [];
    for (const target of targets) {
      let r = await this.check(target);
      for (let attempt = 0; attempt < this.retries && !r.passed; attempt++) {
        logger.info({ target: target.name, outcome: r.outcome }, "Re-checking failed target");
        r = await this.check(target);
      }
      results.push(r);
    }
    assertConsistent(targets, results);
    return results;
  }

  /** Poll until the endpoint answers or the policy runs out. Returns the last result. */
  async waitForReady(target: VerificationTarget, policy: RetryPolicy): Promise<DiagnosticResult> {
    let r = await this.check(target);
    for (let n = 1; n < policy.attempts && !r.passed; n++) {
      await sleep(policy.intervalMs);
      r = await this.check(target);
    }
    return r;
  }
}

export function assertConsistent(targets: readonly VerificationTarget[], results: readonly DiagnosticResult[]): void {
  const byName = new Map(results.map((r) => [r.checkName, r]));
  for (const target of targets) {
    if (!target.via) continue;
    const own = byName.get(target.name);
    const upstream = byName.get(target.via);
    if (own?.passed && upstream && !upstream.passed) {
      throw new VerifierInconsistencyError(`${target.name} passed although ${target.via} failed (${upstream.outcome})`, {
        target: target.name,
        upstream: target.via,
      });
    }
  }
}
