import { formatDiagnostics, formatRunReport, formatTopology, formatValidation } from "../../../src/orchestrator/report.js";
import type { RunReport } from "../../../src/orchestrator/types.js";
import { makeResult } from "../../../src/verify/result.js";
import { ConnectivityTimeoutError } from "../../../src/errors.js";
import { HOST_TOPOLOGY } from "../../helpers/host-fixture.js";

describe("formatRunReport", () => {
  it("numbers the steps and lists both endpoints when ready", () => {
    const report: RunReport = {
      state: "Ready",
      topology: HOST_TOPOLOGY,
      steps: [
        { step: 1, state: "ProbingTopology", detail: "host (windows), peer 172.21.208.1 on vEthernet (WSL)" },
        { step: 2, state: "Verifying", detail: "2 endpoints reachable" },
      ],
      results: [],
      failedState: null,
      error: null,
      endpoints: ["http://127.0.0.1:9222", "http://172.21.208.1:9222"],
    };
    expect(formatRunReport(report)).toBe(
      [
        "Step 1 (ProbingTopology): host (windows), peer 172.21.208.1 on vEthernet (WSL)",
        "Step 2 (Verifying): 2 endpoints reachable",
        "",
        "Ready. Debug endpoints:",
        "  http://127.0.0.1:9222",
        "  http://172.21.208.1:9222",
      ].join("\n"),
    );
  });

  it("names the failing step and its fix", () => {
    const report: RunReport = {
      state: "Failed",
      topology: HOST_TOPOLOGY,
      steps: [{ step: 1, state: "ProbingTopology", detail: "host" }],
      results: [makeResult("cross-boundary", "timeout", "no answer within 5000 ms", "open the firewall")],
      failedState: "Verifying",
      error: new ConnectivityTimeoutError("cross-boundary: no answer within 5000 ms", "open the firewall"),
      endpoints: [],
    };
    expect(formatRunReport(report)).toBe(
      [
        "Step 1 (ProbingTopology): host",
        "",
        "Step 2 (Verifying) failed: cross-boundary: no answer within 5000 ms",
        "  [Timeout] cross-boundary: no answer within 5000 ms",
        "Fix: open the firewall",
      ].join("\n"),
    );
  });
});

describe("formatDiagnostics", () => {
  it("prints each check with the fix under failures", () => {
    const text = formatDiagnostics([
      makeResult("environment", "success", "host (windows)"),
      makeResult("endpoint loopback", "refused", "connection refused", "launch the browser"),
      makeResult("relay", "skipped", "Disabled in config"),
    ]);
    expect(text.split("\n")).toEqual([
      "Diagnostics",
      "",
      "[OK] environment: host (windows)",
      "[Refused] endpoint loopback: connection refused",
      "    Fix: launch the browser",
      "[Skipped] relay: Disabled in config",
      "",
      "1 of 3 checks failed.",
    ]);
  });
});

describe("formatValidation", () => {
  it("ends with the verdict", () => {
    expect(formatValidation({ ok: true, results: [makeResult("loopback", "success", "Chrome at 127.0.0.1:9222")] })).toBe(
      "[OK] loopback: Chrome at 127.0.0.1:9222\nValidation PASSED",
    );
  });
});

describe("formatTopology", () => {
  it("shows that the guest has no browser of its own", () => {
    const text = formatTopology({ ...HOST_TOPOLOGY, role: "guest", environment: "wsl", adapterName: "eth0" }, null);
    expect(text.split("\n")).toContain("Browser:      not managed on this side");
    expect(text.split("\n")[0]).toBe("Role:         guest");
  });
});
