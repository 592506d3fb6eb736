/**
 * @module codec/lpp
 * @description Cayenne LPP encoder/decoder.
 *
 * Wire format: repeated `[channel:1][type:1][value:N]`, where N is fixed per
 * sensor type and multi-byte sub-fields are big-endian. Decoding stops at the
 * first record that cannot be read in full; the records before it are kept.
 *
 * @example
 * ```ts
 * const frame = new LppEncoder()
 *   .addTemperature(1, 21.5)
 *   .addHumidity(2, 48)
 *   .toBytes();
 * decodeLpp(frame); // two points
 * ```
 */

import { ByteReader, ByteWriter } from "./bytes.js";
import { LppSensorType } from "../types/lpp.js";
import type { LppDataPoint, LppValue } from "../types/lpp.js";
import type { UnixTimestamp } from "../types/branded.js";

// ─── Sensor Table ───────────────────────────────────────────────────

type Layout =
  | { readonly shape: "digital" }
  | {
      readonly shape: "scalar";
      readonly output: "integer" | "float";
      readonly width: 1 | 2 | 4;
      readonly signed: boolean;
      readonly divisor: number;
    }
  | { readonly shape: "vector3"; readonly divisor: number }
  | { readonly shape: "gps" }
  | { readonly shape: "rgb" }
  | { readonly shape: "timestamp" };

interface SensorDef {
  readonly type: LppSensorType;
  readonly name: string;
  readonly layout: Layout;
  /** Display suffix, including any leading space. */
  readonly unit: string;
  /** Fraction digits for display. */
  readonly digits: number;
}

const scalar = (
  output: "integer" | "float",
  width: 1 | 2 | 4,
  signed: boolean,
  divisor: number
): Layout => ({ shape: "scalar", output, width, signed, divisor });

const T = LppSensorType;

const SENSORS: readonly SensorDef[] = [
  { type: T.DIGITAL_INPUT, name: "Digital Input", layout: { shape: "digital" }, unit: "", digits: 0 },
  { type: T.DIGITAL_OUTPUT, name: "Digital Output", layout: { shape: "digital" }, unit: "", digits: 0 },
  { type: T.ANALOG_INPUT, name: "Analog Input", layout: scalar("float", 2, true, 100), unit: "", digits: 2 },
  { type: T.ANALOG_OUTPUT, name: "Analog Output", layout: scalar("float", 2, true, 100), unit: "", digits: 2 },
  { type: T.GENERIC_SENSOR, name: "Sensor", layout: scalar("integer", 4, true, 1), unit: "", digits: 0 },
  { type: T.ILLUMINANCE, name: "Illuminance", layout: scalar("integer", 2, false, 1), unit: " lux", digits: 0 },
  { type: T.PRESENCE, name: "Presence", layout: { shape: "digital" }, unit: "", digits: 0 },
  { type: T.TEMPERATURE, name: "Temperature", layout: scalar("float", 2, true, 10), unit: "°C", digits: 1 },
  { type: T.HUMIDITY, name: "Humidity", layout: scalar("float", 1, false, 2), unit: "%", digits: 1 },
  { type: T.ACCELEROMETER, name: "Accelerometer", layout: { shape: "vector3", divisor: 1000 }, unit: " g", digits: 3 },
  { type: T.BAROMETER, name: "Barometer", layout: scalar("float", 2, false, 10), unit: " hPa", digits: 1 },
  { type: T.VOLTAGE, name: "Voltage", layout: scalar("float", 2, false, 100), unit: " V", digits: 2 },
  { type: T.CURRENT, name: "Current", layout: scalar("float", 2, false, 1000), unit: " A", digits: 3 },
  { type: T.FREQUENCY, name: "Frequency", layout: scalar("integer", 4, false, 1), unit: " Hz", digits: 0 },
  { type: T.PERCENTAGE, name: "Percentage", layout: scalar("integer", 1, false, 1), unit: "%", digits: 0 },
  { type: T.ALTITUDE, name: "Altitude", layout: scalar("float", 2, true, 1), unit: " m", digits: 1 },
  { type: T.LOAD, name: "Load", layout: scalar("float", 2, false, 100), unit: " kg", digits: 2 },
  { type: T.CONCENTRATION, name: "Concentration", layout: scalar("integer", 2, false, 1), unit: " ppm", digits: 0 },
  { type: T.POWER, name: "Power", layout: scalar("integer", 2, false, 1), unit: " W", digits: 0 },
  { type: T.DISTANCE, name: "Distance", layout: scalar("float", 4, false, 1000), unit: " m", digits: 2 },
  { type: T.ENERGY, name: "Energy", layout: scalar("float", 4, false, 1000), unit: " kWh", digits: 3 },
  { type: T.DIRECTION, name: "Direction", layout: scalar("integer", 2, false, 1), unit: "°", digits: 0 },
  { type: T.UNIX_TIME, name: "Time", layout: { shape: "timestamp" }, unit: "", digits: 0 },
  { type: T.GYROMETER, name: "Gyrometer", layout: { shape: "vector3", divisor: 100 }, unit: " °/s", digits: 1 },
  { type: T.COLOUR, name: "Colour", layout: { shape: "rgb" }, unit: "", digits: 0 },
  { type: T.GPS, name: "GPS", layout: { shape: "gps" }, unit: "m", digits: 1 },
  { type: T.SWITCH, name: "Switch", layout: { shape: "digital" }, unit: "", digits: 0 },
];

const SENSOR_BY_CODE = new Map<number, SensorDef>(
  SENSORS.map((sensor) => [sensor.type, sensor])
);

function layoutSize(layout: Layout): number {
  switch (layout.shape) {
    case "digital":
      return 1;
    case "scalar":
      return layout.width;
    case "vector3":
      return 6;
    case "gps":
      return 9;
    case "rgb":
      return 3;
    case "timestamp":
      return 4;
  }
}

function sensorDef(type: LppSensorType): SensorDef {
  const sensor = SENSOR_BY_CODE.get(type);
  if (!sensor) {
    throw new RangeError(`Unknown LPP sensor type ${type}`);
  }
  return sensor;
}

/** Value width in bytes for a sensor type, or undefined if the code is unknown. */
export function lppValueSize(typeCode: number): number | undefined {
  const sensor = SENSOR_BY_CODE.get(typeCode);
  return sensor ? layoutSize(sensor.layout) : undefined;
}

/** Human-readable sensor name ("Temperature", "GPS", …). */
export function lppSensorName(typeCode: number): string {
  return SENSOR_BY_CODE.get(typeCode)?.name ?? `Unknown (${typeCode})`;
}

// ─── Decoding ───────────────────────────────────────────────────────

function readScalar(
  reader: ByteReader,
  width: 1 | 2 | 4,
  signed: boolean
): number {
  switch (width) {
    case 1:
      return signed ? reader.i8() : reader.u8();
    case 2:
      return signed ? reader.i16be() : reader.u16be();
    case 4:
      return signed ? reader.i32be() : reader.u32be();
  }
}

function decodeValue(layout: Layout, reader: ByteReader): LppValue {
  switch (layout.shape) {
    case "digital":
      return { kind: "digital", value: reader.u8() !== 0 };
    case "scalar": {
      const raw = readScalar(reader, layout.width, layout.signed);
      return { kind: layout.output, value: raw / layout.divisor };
    }
    case "vector3":
      return {
        kind: "vector3",
        x: reader.i16be() / layout.divisor,
        y: reader.i16be() / layout.divisor,
        z: reader.i16be() / layout.divisor,
      };
    case "gps":
      return {
        kind: "gps",
        latitude: reader.i24be() / 10000,
        longitude: reader.i24be() / 10000,
        altitude: reader.i24be() / 100,
      };
    case "rgb":
      return {
        kind: "rgb",
        red: reader.u8(),
        green: reader.u8(),
        blue: reader.u8(),
      };
    case "timestamp":
      return { kind: "timestamp", value: reader.u32be() as UnixTimestamp };
  }
}

/**
 * Decodes an LPP frame. Never throws: a short header, an unknown type code
 * or a short value ends decoding and the points read so far are returned.
 */
export function decodeLpp(data: Uint8Array): LppDataPoint[] {
  const points: LppDataPoint[] = [];
  const reader = new ByteReader(data);

  while (reader.remaining >= 2) {
    const channel = reader.u8();
    const sensor = SENSOR_BY_CODE.get(reader.u8());
    if (!sensor) break;
    if (reader.remaining < layoutSize(sensor.layout)) break;
    points.push({ channel, type: sensor.type, value: decodeValue(sensor.layout, reader) });
  }

  return points;
}

// ─── Encoding ───────────────────────────────────────────────────────

/** Nearest wire step; the writer then wraps to the field width. */
const toWire = (value: number, divisor: number): number =>
  Math.round(value * divisor);

function scalarOf(value: LppValue): number | undefined {
  switch (value.kind) {
    case "integer":
    case "float":
    case "timestamp":
      return value.value;
    case "digital":
      return value.value ? 1 : 0;
    default:
      return undefined;
  }
}

function encodeValue(
  writer: ByteWriter,
  sensor: SensorDef,
  value: LppValue
): void {
  const { layout } = sensor;
  const mismatch = () =>
    new TypeError(`A ${value.kind} value cannot be encoded as ${sensor.name}`);

  switch (layout.shape) {
    case "digital":
    case "scalar":
    case "timestamp": {
      const n = scalarOf(value);
      if (n === undefined) throw mismatch();
      if (layout.shape === "digital") {
        writer.u8(n);
      } else if (layout.shape === "timestamp") {
        writer.u32be(n);
      } else {
        const raw = toWire(n, layout.divisor);
        if (layout.width === 1) writer.u8(raw);
        else if (layout.width === 2) writer.u16be(raw);
        else writer.u32be(raw);
      }
      return;
    }
    case "vector3":
      if (value.kind !== "vector3") throw mismatch();
      writer
        .u16be(toWire(value.x, layout.divisor))
        .u16be(toWire(value.y, layout.divisor))
        .u16be(toWire(value.z, layout.divisor));
      return;
    case "gps":
      if (value.kind !== "gps") throw mismatch();
      writer
        .u24be(toWire(value.latitude, 10000))
        .u24be(toWire(value.longitude, 10000))
        .u24be(toWire(value.altitude, 100));
      return;
    case "rgb":
      if (value.kind !== "rgb") throw mismatch();
      writer.u8(value.red).u8(value.green).u8(value.blue);
      return;
  }
}

/**
 * Fluent LPP frame builder. Values are scaled to the sensor's wire step
 * and wrap (rather than clamp) when they overflow the field.
 */
export class LppEncoder {
  private readonly writer = new ByteWriter();

  get length(): number {
    return this.writer.length;
  }

  /**
   * Appends a decoded point.
   * @throws {TypeError} if the value kind does not fit the sensor type.
   */
  add(point: LppDataPoint): this {
    const sensor = sensorDef(point.type);
    this.writer.u8(point.channel).u8(sensor.type);
    encodeValue(this.writer, sensor, point.value);
    return this;
  }

  addDigitalInput(channel: number, on: boolean): this {
    return this.add({ channel, type: T.DIGITAL_INPUT, value: { kind: "digital", value: on } });
  }

  addDigitalOutput(channel: number, on: boolean): this {
    return this.add({ channel, type: T.DIGITAL_OUTPUT, value: { kind: "digital", value: on } });
  }

  addAnalogInput(channel: number, value: number): this {
    return this.add({ channel, type: T.ANALOG_INPUT, value: { kind: "float", value } });
  }

  addAnalogOutput(channel: number, value: number): this {
    return this.add({ channel, type: T.ANALOG_OUTPUT, value: { kind: "float", value } });
  }

  addTemperature(channel: number, celsius: number): this {
    return this.add({ channel, type: T.TEMPERATURE, value: { kind: "float", value: celsius } });
  }

  addHumidity(channel: number, percent: number): this {
    return this.add({ channel, type: T.HUMIDITY, value: { kind: "float", value: percent } });
  }

  addBarometer(channel: number, hPa: number): this {
    return this.add({ channel, type: T.BAROMETER, value: { kind: "float", value: hPa } });
  }

  addIlluminance(channel: number, lux: number): this {
    return this.add({ channel, type: T.ILLUMINANCE, value: { kind: "integer", value: lux } });
  }

  addVoltage(channel: number, volts: number): this {
    return this.add({ channel, type: T.VOLTAGE, value: { kind: "float", value: volts } });
  }

  addCurrent(channel: number, amps: number): this {
    return this.add({ channel, type: T.CURRENT, value: { kind: "float", value: amps } });
  }

  addPercentage(channel: number, percent: number): this {
    return this.add({ channel, type: T.PERCENTAGE, value: { kind: "integer", value: percent } });
  }

  addAccelerometer(channel: number, x: number, y: number, z: number): this {
    return this.add({ channel, type: T.ACCELEROMETER, value: { kind: "vector3", x, y, z } });
  }

  addGyrometer(channel: number, x: number, y: number, z: number): this {
    return this.add({ channel, type: T.GYROMETER, value: { kind: "vector3", x, y, z } });
  }

  addGps(channel: number, latitude: number, longitude: number, altitude: number): this {
    return this.add({
      channel,
      type: T.GPS,
      value: { kind: "gps", latitude, longitude, altitude },
    });
  }

  addColour(channel: number, red: number, green: number, blue: number): this {
    return this.add({ channel, type: T.COLOUR, value: { kind: "rgb", red, green, blue } });
  }

  addUnixTime(channel: number, seconds: UnixTimestamp): this {
    return this.add({ channel, type: T.UNIX_TIME, value: { kind: "timestamp", value: seconds } });
  }

  /** Appends pre-encoded value bytes, zero-padded or cut to the type's width. */
  addRaw(channel: number, type: LppSensorType, data: Uint8Array): this {
    const sensor = sensorDef(type);
    this.writer.u8(channel).u8(type).fixed(data, layoutSize(sensor.layout));
    return this;
  }

  toBytes(): Uint8Array {
    return this.writer.toBytes();
  }
}

/** Encodes points into one LPP frame. */
export function encodeLpp(points: readonly LppDataPoint[]): Uint8Array {
  const encoder = new LppEncoder();
  for (const point of points) encoder.add(point);
  return encoder.toBytes();
}

// ─── Display ────────────────────────────────────────────────────────

/** Renders a point's value with its unit, e.g. `"21.5°C"` or `"48 lux"`. */
export function formatLppValue(point: LppDataPoint): string {
  const { unit, digits } = sensorDef(point.type);
  const v = point.value;
  switch (v.kind) {
    case "digital":
      return v.value ? "On" : "Off";
    case "integer":
      return `${v.value}${unit}`;
    case "float":
      return `${v.value.toFixed(digits)}${unit}`;
    case "vector3":
      return `X:${v.x.toFixed(digits)} Y:${v.y.toFixed(digits)} Z:${v.z.toFixed(digits)}${unit}`;
    case "gps":
      return `${v.latitude.toFixed(6)}, ${v.longitude.toFixed(6)} @ ${v.altitude.toFixed(1)}m`;
    case "rgb":
      return `RGB(${v.red}, ${v.green}, ${v.blue})`;
    case "timestamp":
      return new Date(v.value * 1000).toISOString();
  }
}

/** LiPo estimate for voltage points: 4.2 V is 100 %, 3.0 V is 0 %. */
export function lppBatteryPercentage(point: LppDataPoint): number | undefined {
  if (point.type !== T.VOLTAGE || point.value.kind !== "float") return undefined;
  const percent = ((point.value.value - 3.0) / 1.2) * 100;
  return Math.trunc(Math.min(100, Math.max(0, percent)));
}
