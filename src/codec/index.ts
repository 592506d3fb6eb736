/**
 * @module codec
 * @description Wire codecs: command encoder, frame decoder, binary
 * re-parsers, LPP telemetry and stream framing.
 */

export * from "./bytes.js";
export * from "./codes.js";
export * from "./commands.js";
export * from "./responses.js";
export * from "./binary.js";
export * from "./lpp.js";
export * from "./framing.js";
