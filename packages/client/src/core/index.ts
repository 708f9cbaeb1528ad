/**
 * Core client primitives
 *
 * - PushTransport: anything that delivers server-pushed frames
 * - EventStream: the EventSource implementation, with backoff
 * - HttpClient: the request side of the protocol
 */

export type { PushTransport, StreamListener } from "./transport";

export { EventStream, type EventStreamConfig } from "./event-stream";

export { HttpClient, ServerReplyError, type HttpClientConfig } from "./http";
