import { LocalExecutor, commandFailure, powerShell, psQuote, type ExecResult } from "../../../src/execution/executor.js";
import { CommandFailedError, InsufficientPrivilegeError } from "../../../src/errors.js";

function failed(stderr: string, stdout = ""): ExecResult {
  return { stdout, stderr, exitCode: 1, timedOut: false, durationMs: 3 };
}

describe("psQuote", () => {
  it("doubles embedded single quotes", () => {
    expect(psQuote("C:\\Users\\o'neil\\chrome")).toBe("'C:\\Users\\o''neil\\chrome'");
  });
});

describe("powerShell", () => {
  it("runs the script non-interactively without a profile", () => {
    expect(powerShell("Get-Date").argv).toEqual([
      "powershell.exe",
      "-NoProfile",
      "-NonInteractive",
      "-ExecutionPolicy",
      "Bypass",
      "-Command",
      "Get-Date",
    ]);
  });
});

describe("commandFailure", () => {
  it("recognises an access-denied refusal as missing elevation", () => {
    const err = commandFailure("Creating firewall rule", failed("New-NetFirewallRule : Access is denied."));
    expect(err).toBeInstanceOf(InsufficientPrivilegeError);
    expect(err.message).toBe("Creating firewall rule was rejected: elevated rights required");
  });

  it("falls back to stdout when stderr is empty", () => {
    const err = commandFailure("Adding port mapping", failed("", "The parameter is incorrect.\r\n"));
    expect(err).toBeInstanceOf(CommandFailedError);
    expect(err.message).toBe("Adding port mapping failed (exit 1): The parameter is incorrect.");
  });
});

describe("LocalExecutor", () => {
  const executor = new LocalExecutor();

  it("captures output and exit code", async () => {
    const r = await executor.execute(
      { argv: [process.execPath, "-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"] },
      10_000,
    );
    expect(r).toMatchObject({ stdout: "out", stderr: "err", exitCode: 3, timedOut: false });
  });

  it("feeds stdin to the command", async () => {
    const r = await executor.execute(
      { argv: [process.execPath, "-e", "process.stdin.pipe(process.stdout)"], stdin: "piped" },
      10_000,
    );
    expect(r.stdout).toBe("piped");
  });

  it("rejects an empty command", async () => {
    await expect(executor.execute({ argv: [] }, 1000)).rejects.toThrow("Cannot execute an empty command");
  });
});
