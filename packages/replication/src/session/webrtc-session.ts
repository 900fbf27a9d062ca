import { MAX_WEBRTC_MESSAGE_LEN } from "../constants.js";
import { NotImplementedError } from "../errors.js";
import { CloseSignal, OneShotSessionBuilder } from "./builder.js";
import type { Session } from "./types.js";

/**
 * WebRTC data-channel builder. ICE/SDP negotiation is not available, so every
 * build fails with {@link NotImplementedError}.
 */
export class WebrtcSessionBuilder extends OneShotSessionBuilder {
  readonly kind = "webrtc" as const;

  protected negotiate(): Session {
    throw new NotImplementedError("[WebrtcSessionBuilder] build()");
  }
}

/**
 * Session half of the WebRTC transport. Exposes the full session contract but
 * refuses to send.
 */
export class WebrtcSession implements Session {
  readonly kind = "webrtc" as const;
  readonly remote: string;
  private closeSignal = new CloseSignal();

  constructor(remote: string) {
    this.remote = remote;
  }

  sendPacket(): void {
    throw new NotImplementedError("[WebrtcSession] sendPacket()");
  }

  maxPacketLen(): number {
    console.warn(
      `[WebrtcSession] Returning max WebRTC message length as ${MAX_WEBRTC_MESSAGE_LEN}, but in practice it's likely lower`,
    );
    return MAX_WEBRTC_MESSAGE_LEN;
  }

  isOpen(): boolean {
    return !this.closeSignal.closed;
  }

  close(): void {
    this.closeSignal.fire();
  }

  onClose(handler: () => void): void {
    this.closeSignal.add(handler);
  }
}
