import { z } from "zod";
import { BROWSERS } from "./browser.js";

const port = z.number().int().min(1).max(65535);

/** Config file schema. Every key has a default, so partial files are valid. */
export const bridgeConfigSchema = z.object({
  browser: z.object({
    name: z.enum(BROWSERS),
    port,
    executable: z.string().nullable(),
    profile_dir: z.string().nullable(),
    extra_flags: z.array(z.string()),
    launch_url: z.string(),
    ready_attempts: z.number().int().min(1),
    ready_interval_ms: z.number().int().min(0),
  }),
  network: z.object({
    adapter_pattern: z.string().min(1),
    firewall_rule_prefix: z.string().min(1),
  }),
  verify: z.object({
    timeout_ms: z.number().int().min(100),
    retries: z.number().int().min(0).max(1),
  }),
  guest: z.object({
    relay: z.boolean(),
    host_command: z.string().min(1),
  }),
  serve: z.object({
    http_port: port,
  }),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
