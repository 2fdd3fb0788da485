import type { TransportState } from "./types.js";

/**
 * What a transport state means for the chat link.
 *
 * - `up`: data can flow
 * - `down`: the link is gone (possibly only for now)
 * - `ignore`: transitional or unknown, keep the previous status
 */
export type LinkStatus = "up" | "down" | "ignore";

/**
 * Engine vocabulary mapped to link status. Mirrors the W3C
 * RTCPeerConnectionState values reported by werift and browsers;
 * `new` and `connecting` are transitional.
 */
const LINK_STATUS_BY_STATE: Readonly<Record<string, LinkStatus>> = {
  connected: "up",
  disconnected: "down",
  failed: "down",
  closed: "down",
};

export function classifyTransportState(state: TransportState): LinkStatus {
  return Object.hasOwn(LINK_STATUS_BY_STATE, state) ? LINK_STATUS_BY_STATE[state] : "ignore";
}
