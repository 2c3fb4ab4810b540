/** Which side of the host/guest boundary this process runs on. */
export type Role = "host" | "guest" | "unknown";

/** Concrete environment behind the role. */
export type Environment = "windows" | "wsl" | "linux" | "macos" | "unknown";

/**
 * Network layout discovered at the start of a run.
 * Recomputed every invocation: the adapter address changes across reboots.
 */
export interface Topology {
  readonly role: Role;
  readonly environment: Environment;
  /** Host: the host's own address on the virtual adapter. Guest: the host as seen from the guest. */
  readonly peerAddress: string;
  readonly peerAddressRange: string;
  readonly adapterName: string;
}
