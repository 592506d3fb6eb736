/**
 * @module types
 * @description Public type exports.
 */

export * from "./branded.js";
export * from "./contact.js";
export * from "./device.js";
export * from "./lpp.js";
export * from "./transport.js";
export * from "./events.js";
