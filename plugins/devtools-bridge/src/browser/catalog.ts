import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { BrowserName } from "../types/browser.js";
import type { Environment } from "../types/topology.js";

/** Built-in catalog shipped beside the package sources. */
export const DEFAULT_CATALOG_PATH = join(__dirname, "..", "..", "knowledge", "browsers.yaml");

const perEnvironment = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ windows: value, wsl: value, linux: value, macos: value });

const catalogEntry = z.object({
  display_name: z.string(),
  commands: z.array(z.string()),
  process_names: perEnvironment(z.string()),
  paths: perEnvironment(z.array(z.string())),
});

const catalogSchema = z.object({
  chrome: catalogEntry,
  firefox: catalogEntry,
  librewolf: catalogEntry,
});

export type CatalogEntry = z.infer<typeof catalogEntry>;
export type BrowserCatalog = z.infer<typeof catalogSchema>;

export function loadBrowserCatalog(path: string = DEFAULT_CATALOG_PATH): BrowserCatalog {
  const raw = readFileSync(path, "utf-8");
  return catalogSchema.parse(parseYaml(raw));
}

type KnownEnvironment = Exclude<Environment, "unknown">;

function knownEnvironment(environment: Environment): KnownEnvironment {
  return environment === "unknown" ? "linux" : environment;
}

/** Image name as the process table lists it (what taskkill / pkill match). */
export function processNameFor(catalog: BrowserCatalog, browser: BrowserName, environment: Environment): string {
  return catalog[browser].process_names[knownEnvironment(environment)];
}

/** Candidate install paths, with %VAR% references expanded. */
export function installPathsFor(
  catalog: BrowserCatalog,
  browser: BrowserName,
  environment: Environment,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  return catalog[browser].paths[knownEnvironment(environment)].map((p) => expandWindowsVars(p, env));
}

export function expandWindowsVars(path: string, env: NodeJS.ProcessEnv): string {
  return path.replace(/%([^%]+)%/g, (whole, name: string) => {
    const key = Object.keys(env).find((k) => k.toLowerCase() === name.toLowerCase());
    const value = key === undefined ? undefined : env[key];
    return value ?? whole;
  });
}
