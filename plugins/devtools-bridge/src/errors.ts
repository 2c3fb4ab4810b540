export enum BridgeErrorCode {
  TOPOLOGY_UNRESOLVED = "TOPOLOGY_UNRESOLVED",
  INSUFFICIENT_PRIVILEGE = "INSUFFICIENT_PRIVILEGE",
  INVALID_MAPPING_DIRECTION = "INVALID_MAPPING_DIRECTION",
  CONNECTIVITY_TIMEOUT = "CONNECTIVITY_TIMEOUT",
  CONNECTIVITY_REFUSED = "CONNECTIVITY_REFUSED",
  BROWSER_NOT_FOUND = "BROWSER_NOT_FOUND",
  BROWSER_CONTROL = "BROWSER_CONTROL",
  COMMAND_FAILED = "COMMAND_FAILED",
  VERIFIER_INCONSISTENT = "VERIFIER_INCONSISTENT",
  CONFIG_INVALID = "CONFIG_INVALID",
}

/** Process exit code per error kind. The guest decodes the host command's exit code with these. */
export const EXIT_CODES: Record<BridgeErrorCode, number> = {
  [BridgeErrorCode.COMMAND_FAILED]: 1,
  [BridgeErrorCode.VERIFIER_INCONSISTENT]: 1,
  [BridgeErrorCode.CONFIG_INVALID]: 1,
  [BridgeErrorCode.TOPOLOGY_UNRESOLVED]: 2,
  [BridgeErrorCode.INSUFFICIENT_PRIVILEGE]: 3,
  [BridgeErrorCode.CONNECTIVITY_TIMEOUT]: 4,
  [BridgeErrorCode.CONNECTIVITY_REFUSED]: 5,
  [BridgeErrorCode.INVALID_MAPPING_DIRECTION]: 6,
  [BridgeErrorCode.BROWSER_NOT_FOUND]: 7,
  [BridgeErrorCode.BROWSER_CONTROL]: 8,
};

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly remediation: string;
  readonly context?: Record<string, unknown>;

  constructor(code: BridgeErrorCode, message: string, remediation: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.remediation = remediation;
    this.context = context;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class TopologyUnresolvedError extends BridgeError {
  constructor(message: string, remediation: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.TOPOLOGY_UNRESOLVED, message, remediation, context);
    this.name = "TopologyUnresolvedError";
  }
}

export const ELEVATION_REMEDIATION =
  "Re-run elevated: open PowerShell with 'Run as administrator' and start devtools-bridge again.";

export class InsufficientPrivilegeError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.INSUFFICIENT_PRIVILEGE, message, ELEVATION_REMEDIATION, context);
    this.name = "InsufficientPrivilegeError";
  }
}

export class InvalidMappingDirectionError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      BridgeErrorCode.INVALID_MAPPING_DIRECTION,
      message,
      "Listen on the peer-facing adapter address and forward to the loopback address, never the reverse.",
      context,
    );
    this.name = "InvalidMappingDirectionError";
  }
}

export class ConnectivityTimeoutError extends BridgeError {
  constructor(message: string, remediation: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.CONNECTIVITY_TIMEOUT, message, remediation, context);
    this.name = "ConnectivityTimeoutError";
  }
}

export class ConnectivityRefusedError extends BridgeError {
  constructor(message: string, remediation: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.CONNECTIVITY_REFUSED, message, remediation, context);
    this.name = "ConnectivityRefusedError";
  }
}

export class BrowserNotFoundError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      BridgeErrorCode.BROWSER_NOT_FOUND,
      message,
      "Install the browser or set browser.executable in the config file.",
      context,
    );
    this.name = "BrowserNotFoundError";
  }
}

export class BrowserControlError extends BridgeError {
  constructor(message: string, remediation: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.BROWSER_CONTROL, message, remediation, context);
    this.name = "BrowserControlError";
  }
}

export class CommandFailedError extends BridgeError {
  constructor(message: string, remediation: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.COMMAND_FAILED, message, remediation, context);
    this.name = "CommandFailedError";
  }
}

export class VerifierInconsistencyError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      BridgeErrorCode.VERIFIER_INCONSISTENT,
      message,
      "This is a bug in the connectivity verifier; re-run with --verbose and report the log.",
      context,
    );
    this.name = "VerifierInconsistencyError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(BridgeErrorCode.CONFIG_INVALID, message, "Fix or delete the config file; defaults are regenerated on the next run.", context);
    this.name = "ConfigError";
  }
}

/** Wrap anything thrown into a BridgeError, keeping BridgeErrors untouched. */
export function toBridgeError(err: unknown): BridgeError {
  if (err instanceof BridgeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CommandFailedError(message, "Re-run with --verbose to see the failing command.");
}

/**
 * Rebuild an error kind from a child invocation's exit code, the inverse of
 * EXIT_CODES. Used when the guest delegates setup to the host command.
 */
export function errorForExitCode(exitCode: number, message: string, context?: Record<string, unknown>): BridgeError {
  const ctx = { ...context, exitCode };
  switch (exitCode) {
    case 2:
      return new TopologyUnresolvedError(message, "Run devtools-bridge --diagnose on the host to see why the WSL adapter was not found.", ctx);
    case 3:
      return new InsufficientPrivilegeError(message, ctx);
    case 4:
      return new ConnectivityTimeoutError(message, "The host firewall is still dropping guest traffic; run devtools-bridge --diagnose on the host.", ctx);
    case 5:
      return new ConnectivityRefusedError(message, "The browser on the host is not listening; run devtools-bridge --diagnose on the host.", ctx);
    case 6:
      return new InvalidMappingDirectionError(message, ctx);
    case 7:
      return new BrowserNotFoundError(message, ctx);
    case 8:
      return new BrowserControlError(message, "Close the browser on the host manually and re-run.", ctx);
    default:
      return new CommandFailedError(message, "Run the host command directly in an elevated PowerShell to see its output.", ctx);
  }
}
