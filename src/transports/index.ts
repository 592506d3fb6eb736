/**
 * @module transports
 * @description MeshTransport implementations.
 */

export { MockTransport } from "./mock.js";
export type { MockResponder } from "./mock.js";
export { StreamTransport } from "./stream.js";
export type { StreamOpener, StreamTransportOptions } from "./stream.js";
