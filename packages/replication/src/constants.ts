/**
 * Default configuration constants for the replication library
 */

/**
 * How long a listener shutdown waits for the serving task before abandoning it.
 */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 200;

/**
 * Maximum payload of a single stream message.
 * Matches Socket.IO's default `maxHttpBufferSize` (1 MB).
 */
export const DEFAULT_STREAM_MAX_PACKET_LEN = 1_000_000;

/**
 * Maximum payload of a single UDP datagram.
 * Stays below the common 1280-byte IPv6 minimum MTU once headers are added.
 */
export const MAX_DATAGRAM_PACKET_LEN = 1200;

/**
 * How long a datagram session may go without inbound traffic before the
 * endpoint closes it. UDP carries no disconnect, so silence is the only signal.
 */
export const DEFAULT_DATAGRAM_IDLE_TIMEOUT_MS = 30_000;

/**
 * Nominal maximum WebRTC data-channel message length.
 * In practice SCTP fragmentation limits make this lower.
 */
export const MAX_WEBRTC_MESSAGE_LEN = 1200;

/**
 * Socket.IO event name carrying replication packets in both directions.
 */
export const STREAM_PACKET_EVENT = "packet";

/**
 * Default address listeners and endpoints bind to.
 */
export const DEFAULT_BIND_HOST = "0.0.0.0";
