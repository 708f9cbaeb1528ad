/**
 * Push side of the protocol.
 *
 * Events and navigation travel over HTTP and carry their reply. A push
 * transport delivers what the server renders on its own, one frame per
 * render version. Frames sent while the stream was down are gone, so a
 * listener treats `resumed` as a reason to resync.
 */

import type { TransportError } from "yoguido-shared";

export interface StreamListener {
  /** One parsed frame: a server message or a control frame */
  frame(data: unknown): void;
  /** The stream reopened after a drop */
  resumed(): void;
  /** A frame could not be read, or the stream gave up */
  error(error: TransportError): void;
}

export interface PushTransport {
  /**
   * Start receiving for `listener`.
   * @returns a function that closes the stream
   */
  open(listener: StreamListener): () => void;
}
