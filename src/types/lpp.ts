/**
 * @module types/lpp
 * @description Cayenne LPP telemetry model.
 *
 * A telemetry frame is a run of (channel, type, value) records with no
 * length prefix. Each sensor type has a fixed value width.
 */

import type { UnixTimestamp } from "./branded.js";

export const LppSensorType = {
  DIGITAL_INPUT: 0,
  DIGITAL_OUTPUT: 1,
  ANALOG_INPUT: 2,
  ANALOG_OUTPUT: 3,
  GENERIC_SENSOR: 100,
  ILLUMINANCE: 101,
  PRESENCE: 102,
  TEMPERATURE: 103,
  HUMIDITY: 104,
  ACCELEROMETER: 113,
  BAROMETER: 115,
  VOLTAGE: 116,
  CURRENT: 117,
  FREQUENCY: 118,
  PERCENTAGE: 120,
  ALTITUDE: 121,
  LOAD: 122,
  CONCENTRATION: 125,
  POWER: 128,
  DISTANCE: 130,
  ENERGY: 131,
  DIRECTION: 132,
  UNIX_TIME: 133,
  GYROMETER: 134,
  COLOUR: 135,
  GPS: 136,
  SWITCH: 142,
} as const;

export type LppSensorType = (typeof LppSensorType)[keyof typeof LppSensorType];

/** Decoded sensor value, discriminated on `kind`. */
export type LppValue =
  | { readonly kind: "digital"; readonly value: boolean }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | {
      readonly kind: "vector3";
      readonly x: number;
      readonly y: number;
      readonly z: number;
    }
  | {
      readonly kind: "gps";
      readonly latitude: number;
      readonly longitude: number;
      readonly altitude: number;
    }
  | {
      readonly kind: "rgb";
      readonly red: number;
      readonly green: number;
      readonly blue: number;
    }
  | { readonly kind: "timestamp"; readonly value: UnixTimestamp };

export interface LppDataPoint {
  /** Application-defined channel, 0–255. */
  readonly channel: number;
  readonly type: LppSensorType;
  readonly value: LppValue;
}
