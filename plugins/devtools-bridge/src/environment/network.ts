import { isIPv4 } from "node:net";

export const LOOPBACK_ADDRESS = "127.0.0.1";

/** True for 127.0.0.0/8, ::1 and "localhost". */
export function isLoopback(address: string): boolean {
  const normalized = address.trim().toLowerCase();
  if (normalized === "localhost" || normalized === "::1" || normalized === "[::1]") return true;
  return isIPv4(normalized) && normalized.startsWith("127.");
}

/**
 * Approximate the virtual subnet as <a>.<b>.0.0/16 from an address.
 * A heuristic: the adapter's real prefix length is not consulted.
 */
export function deriveRange16(address: string): string {
  if (!isIPv4(address)) throw new Error(`Not an IPv4 address: ${address}`);
  const [a, b] = address.split(".");
  return `${a}.${b}.0.0/16`;
}

/** Convert "172.21.0.0/255.255.0.0" (as Windows reports scopes) to "172.21.0.0/16". */
export function normalizeRange(range: string): string {
  const trimmed = range.trim();
  const slash = trimmed.indexOf("/");
  if (slash === -1) return trimmed;
  const base = trimmed.slice(0, slash);
  const suffix = trimmed.slice(slash + 1);
  if (!isIPv4(suffix)) return trimmed;
  const bits = suffix
    .split(".")
    .map((octet) => Number(octet).toString(2).replace(/0/g, ""))
    .join("").length;
  return `${base}/${bits}`;
}

/** Extract the gateway from `ip route show default` output ("default via <IP> dev eth0 ..."). */
export function parseDefaultGateway(routeOutput: string): string | null {
  for (const line of routeOutput.split("\n")) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] === "default" && parts[1] === "via" && parts[2] && isIPv4(parts[2])) return parts[2];
  }
  return null;
}

/** First IPv4 nameserver in resolv.conf content. */
export function parseNameserver(resolvConf: string): string | null {
  for (const line of resolvConf.split("\n")) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] === "nameserver" && parts[1] && isIPv4(parts[1])) return parts[1];
  }
  return null;
}
