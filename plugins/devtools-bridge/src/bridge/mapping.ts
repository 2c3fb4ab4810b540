import { isIPv4 } from "node:net";
import type { BridgeMapping } from "../types/bridge.js";
import { InvalidMappingDirectionError } from "../errors.js";
import { LOOPBACK_ADDRESS, isLoopback } from "../environment/network.js";

function assertPort(port: number, field: string): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`${field} must be an integer between 1 and 65535, got ${port}`);
  }
}

/**
 * Validated mapping constructor. Listening on loopback and forwarding to the
 * browser's loopback port makes the proxy connect to itself until ephemeral
 * ports run out, so that direction is rejected outright, whatever the ports.
 */
export function createBridgeMapping(input: BridgeMapping): BridgeMapping {
  if (isLoopback(input.listenAddress)) {
    throw new InvalidMappingDirectionError(
      `Listen address ${input.listenAddress} is a loopback address; the mapping is reversed`,
      { mapping: input },
    );
  }
  if (!isLoopback(input.targetAddress)) {
    throw new InvalidMappingDirectionError(
      `Target address ${input.targetAddress} is not the browser's loopback address`,
      { mapping: input },
    );
  }
  if (!isIPv4(input.listenAddress)) {
    throw new InvalidMappingDirectionError(`Listen address ${input.listenAddress} is not an IPv4 address`, { mapping: input });
  }
  assertPort(input.listenPort, "listenPort");
  assertPort(input.targetPort, "targetPort");
  return Object.freeze({ ...input });
}

/** Peer-facing adapter address:port → 127.0.0.1:port. */
export function hostMapping(peerAddress: string, port: number): BridgeMapping {
  return createBridgeMapping({ listenAddress: peerAddress, listenPort: port, targetAddress: LOOPBACK_ADDRESS, targetPort: port });
}
