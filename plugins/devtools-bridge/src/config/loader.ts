// Config loader: reads ~/.config/devtools-bridge/config.yaml and deep-merges it over defaults.
// First run (no file) writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged result is validated against bridgeConfigSchema; an invalid file falls back to defaults.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { bridgeConfigSchema, type BridgeConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "devtools-bridge");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: BridgeConfig = {
  browser: {
    name: "chrome",
    port: 9222,
    executable: null,
    profile_dir: null,
    extra_flags: [],
    launch_url: "about:blank",
    ready_attempts: 10,
    ready_interval_ms: 1000,
  },
  network: {
    adapter_pattern: "*WSL*",
    firewall_rule_prefix: "devtools-bridge",
  },
  verify: {
    timeout_ms: 5000,
    retries: 1,
  },
  guest: {
    relay: true,
    host_command: "devtools-bridge",
  },
  serve: {
    http_port: 8080,
  },
};

const DEFAULT_CONFIG_YAML = `# devtools-bridge configuration
# Generated automatically on first run. All values shown are defaults.

browser:
  # chrome | firefox | librewolf
  name: chrome
  port: 9222
  # Absolute path; null searches the usual install locations and PATH
  executable: null
  # null uses <tmpdir>/devtools-bridge-<browser>-profile (wiped before every launch)
  profile_dir: null
  extra_flags: []
  launch_url: about:blank
  ready_attempts: 10
  ready_interval_ms: 1000

network:
  # Wildcard match on the host's virtual adapter alias
  adapter_pattern: "*WSL*"
  # Firewall rule name is <prefix>-<port>
  firewall_rule_prefix: devtools-bridge

verify:
  timeout_ms: 5000
  # 0 or 1
  retries: 1

guest:
  # Relay guest 127.0.0.1:<port> to the host
  relay: true
  # Command PowerShell runs on the host when the guest triggers setup
  host_command: devtools-bridge

serve:
  http_port: 8080
`;

export interface ConfigResult {
  config: BridgeConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, writing defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const overrides = isPlainObject(parsed) ? parsed : {};
    const merged = deepMerge(toRecord(DEFAULT_CONFIG), overrides);
    const result = bridgeConfigSchema.safeParse(merged);
    if (!result.success) {
      logger.error({ configPath, issues: result.error.issues }, "Invalid config, using defaults");
      return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
    }
    return { config: result.data, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: BridgeConfig): Record<string, unknown> {
  return { ...config };
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
