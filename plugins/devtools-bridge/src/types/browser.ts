export const BROWSERS = ["chrome", "firefox", "librewolf"] as const;

export type BrowserName = (typeof BROWSERS)[number];

/** Everything needed to start one debuggable browser session. */
export interface BrowserProcessSpec {
  readonly browser: BrowserName;
  readonly executablePath: string;
  readonly profileDirectory: string;
  readonly debugPort: number;
  readonly extraFlags: readonly string[];
  readonly launchTargetURL: string;
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly executablePath: string;
  readonly args: readonly string[];
}
