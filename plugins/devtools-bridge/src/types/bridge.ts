/** Port forwarding entry: peer-facing listener → browser loopback listener. */
export interface BridgeMapping {
  readonly listenAddress: string;
  readonly listenPort: number;
  readonly targetAddress: string;
  readonly targetPort: number;
}
