import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from "axios";

/** A reply body, or the network error code the request should fail with. */
export type ScriptedReply = { body: unknown; status?: number } | { error: "ECONNREFUSED" | "ECONNABORTED" | "EHOSTUNREACH" };

/**
 * axios client whose adapter answers from `reply(url)` without touching the
 * network. Every requested URL is recorded in `urls`.
 */
export function scriptedClient(reply: (url: string) => ScriptedReply): { client: AxiosInstance; urls: string[] } {
  const urls: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? "";
    urls.push(url);
    const r = reply(url);
    if ("error" in r) throw new AxiosError(`request to ${url} failed: ${r.error}`, r.error, config);
    return { data: r.body, status: r.status ?? 200, statusText: "OK", headers: {}, config };
  };
  return { client: axios.create({ adapter }), urls };
}

export const CHROME_VERSION = { Browser: "Chrome/126.0.6478.127", "Protocol-Version": "1.3" };
