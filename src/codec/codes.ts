/**
 * @module codec/codes
 * @description Companion-protocol opcodes.
 *
 * Byte 0 of every frame. Commands go to the radio; responses (< 0x80)
 * answer the command in flight; pushes (>= 0x80) arrive unsolicited.
 */

export const CommandCode = {
  APP_START: 0x01,
  SEND_MESSAGE: 0x02,
  SEND_CHANNEL_MESSAGE: 0x03,
  GET_CONTACTS: 0x04,
  GET_TIME: 0x05,
  SET_TIME: 0x06,
  SEND_ADVERTISEMENT: 0x07,
  SET_NAME: 0x08,
  UPDATE_CONTACT: 0x09,
  GET_MESSAGE: 0x0a,
  SET_RADIO: 0x0b,
  SET_TX_POWER: 0x0c,
  RESET_PATH: 0x0d,
  SET_COORDINATES: 0x0e,
  REMOVE_CONTACT: 0x0f,
  SHARE_CONTACT: 0x10,
  EXPORT_CONTACT: 0x11,
  IMPORT_CONTACT: 0x12,
  REBOOT: 0x13,
  GET_BATTERY: 0x14,
  SET_TUNING: 0x15,
  DEVICE_QUERY: 0x16,
  EXPORT_PRIVATE_KEY: 0x17,
  IMPORT_PRIVATE_KEY: 0x18,
  SEND_LOGIN: 0x1a,
  SEND_STATUS_REQUEST: 0x1b,
  SEND_LOGOUT: 0x1d,
  GET_CHANNEL: 0x1f,
  SET_CHANNEL: 0x20,
  SIGN_START: 0x21,
  SIGN_DATA: 0x22,
  SIGN_FINISH: 0x23,
  SEND_TRACE: 0x24,
  SET_DEVICE_PIN: 0x25,
  SET_OTHER_PARAMS: 0x26,
  GET_SELF_TELEMETRY: 0x27,
  GET_CUSTOM_VARS: 0x28,
  SET_CUSTOM_VAR: 0x29,
  BINARY_REQUEST: 0x32,
  FACTORY_RESET: 0x33,
  PATH_DISCOVERY: 0x34,
  SET_FLOOD_SCOPE: 0x36,
  SEND_CONTROL_DATA: 0x37,
  GET_STATS: 0x38,
} as const;

export const ResponseCode = {
  OK: 0x00,
  ERROR: 0x01,
  CONTACT_START: 0x02,
  CONTACT: 0x03,
  CONTACT_END: 0x04,
  SELF_INFO: 0x05,
  MESSAGE_SENT: 0x06,
  CONTACT_MESSAGE: 0x07,
  CHANNEL_MESSAGE: 0x08,
  CURRENT_TIME: 0x09,
  NO_MORE_MESSAGES: 0x0a,
  CONTACT_URI: 0x0b,
  BATTERY: 0x0c,
  DEVICE_INFO: 0x0d,
  PRIVATE_KEY: 0x0e,
  DISABLED: 0x0f,
  CONTACT_MESSAGE_V3: 0x10,
  CHANNEL_MESSAGE_V3: 0x11,
  CHANNEL_INFO: 0x12,
  SIGN_START: 0x13,
  SIGNATURE: 0x14,
  CUSTOM_VARS: 0x15,
  STATS: 0x18,
} as const;

export const PushCode = {
  ADVERTISEMENT: 0x80,
  PATH_UPDATE: 0x81,
  ACK: 0x82,
  MESSAGES_WAITING: 0x83,
  RAW_DATA: 0x84,
  LOGIN_SUCCESS: 0x85,
  LOGIN_FAILED: 0x86,
  STATUS_RESPONSE: 0x87,
  LOG_DATA: 0x88,
  TRACE_DATA: 0x89,
  NEW_ADVERTISEMENT: 0x8a,
  TELEMETRY_RESPONSE: 0x8b,
  BINARY_RESPONSE: 0x8c,
  PATH_DISCOVERY_RESPONSE: 0x8d,
  CONTROL_DATA: 0x8e,
} as const;

/** Boundary between solicited responses and unsolicited pushes. */
export const PUSH_CODE_MIN = 0x80;

/** Request kinds for the binary request/response sub-protocol. */
export const BinaryRequestKind = {
  STATUS: 0x01,
  KEEP_ALIVE: 0x02,
  TELEMETRY: 0x03,
  MMA: 0x04,
  ACL: 0x05,
  NEIGHBOURS: 0x06,
} as const;

export type BinaryRequestKind =
  (typeof BinaryRequestKind)[keyof typeof BinaryRequestKind];

export const StatsKind = {
  CORE: 0x00,
  RADIO: 0x01,
  PACKETS: 0x02,
} as const;

export type StatsKind = (typeof StatsKind)[keyof typeof StatsKind];

export const ControlType = {
  NODE_DISCOVER_REQUEST: 0x80,
  NODE_DISCOVER_RESPONSE: 0x90,
} as const;

export const TextType = {
  PLAIN: 0x00,
  CLI_COMMAND: 0x01,
  SIGNED: 0x02,
} as const;

// ─── Packet size minimums ──────────────────────────────────────────

export const PacketSize = {
  CONTACT: 147,
  SELF_INFO_MIN: 55,
  MESSAGE_SENT_MIN: 9,
  CONTACT_MESSAGE_V1_MIN: 12,
  CONTACT_MESSAGE_V3_MIN: 15,
  CHANNEL_MESSAGE_V1_MIN: 8,
  CHANNEL_MESSAGE_V3_MIN: 11,
  PRIVATE_KEY: 64,
  BATTERY_MIN: 2,
  BATTERY_EXTENDED: 10,
  SIGN_START_MIN: 5,
  DEVICE_INFO_V3_FULL: 79,
  ACK_MIN: 4,
  CONTACTS_START_MIN: 4,
  CORE_STATS_MIN: 9,
  RADIO_STATS_MIN: 12,
  PACKET_STATS_MIN: 24,
  CHANNEL_INFO_MIN: 49,
  STATUS_RESPONSE_MIN: 58,
  STATUS_FIELDS: 51,
  TRACE_DATA_MIN: 11,
  RAW_DATA_MIN: 2,
  CONTROL_DATA_MIN: 4,
  PATH_DISCOVERY_MIN: 6,
  LOGIN_SUCCESS_MIN: 7,
  PUBLIC_KEY: 32,
  KEY_PREFIX: 6,
  PATH_MAX: 64,
  NAME_FIELD: 32,
  SECRET: 16,
} as const;
