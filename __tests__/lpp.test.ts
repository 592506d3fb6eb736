import { describe, it, expect } from "vitest";
import {
  LppEncoder,
  decodeLpp,
  encodeLpp,
  formatLppValue,
  lppBatteryPercentage,
  lppSensorName,
  lppValueSize,
} from "../src/codec/index.js";
import { LppSensorType } from "../src/types/lpp.js";
import type { LppDataPoint } from "../src/types/lpp.js";
import type { UnixTimestamp } from "../src/types/branded.js";

describe("LPP Telemetry Codec", () => {
  describe("lppValueSize()", () => {
    it("should report fixed widths per sensor type", () => {
      expect(lppValueSize(LppSensorType.DIGITAL_INPUT)).toBe(1);
      expect(lppValueSize(LppSensorType.TEMPERATURE)).toBe(2);
      expect(lppValueSize(LppSensorType.ACCELEROMETER)).toBe(6);
      expect(lppValueSize(LppSensorType.GPS)).toBe(9);
      expect(lppValueSize(LppSensorType.COLOUR)).toBe(3);
      expect(lppValueSize(LppSensorType.UNIX_TIME)).toBe(4);
    });

    it("should return undefined for unknown codes", () => {
      expect(lppValueSize(0xee)).toBeUndefined();
    });
  });

  describe("lppSensorName()", () => {
    it("should name known and unknown types", () => {
      expect(lppSensorName(LppSensorType.GPS)).toBe("GPS");
      expect(lppSensorName(250)).toBe("Unknown (250)");
    });
  });

  describe("decodeLpp()", () => {
    it("should decode a temperature record", () => {
      // 0x00E1 = 225 → 22.5 °C
      const points = decodeLpp(Uint8Array.from([1, 103, 0x00, 0xe1]));
      expect(points).toEqual([
        { channel: 1, type: LppSensorType.TEMPERATURE, value: { kind: "float", value: 22.5 } },
      ]);
    });

    it("should decode negative temperatures", () => {
      // 0xFF9C = -100 → -10.0 °C
      const [point] = decodeLpp(Uint8Array.from([2, 103, 0xff, 0x9c]));
      expect(point?.value).toEqual({ kind: "float", value: -10 });
    });

    it("should decode a sequence of records", () => {
      const data = Uint8Array.from([
        1, 104, 0x64, // humidity 100 * 0.5 = 50 %
        2, 116, 0x01, 0x9a, // voltage 410 / 100 = 4.1 V
        3, 0, 0x01, // digital input on
      ]);
      const points = decodeLpp(data);
      expect(points.map((p) => p.channel)).toEqual([1, 2, 3]);
      expect(points[0]?.value).toEqual({ kind: "float", value: 50 });
      expect(points[1]?.value).toEqual({ kind: "float", value: 4.1 });
      expect(points[2]?.value).toEqual({ kind: "digital", value: true });
    });

    it("should sign-extend GPS fields", () => {
      // lat 0x0622A0 = 402080 → 40.208, lon 0xFFFFF6 = -10 → -0.001, alt 0x000064 = 100 → 1
      const data = Uint8Array.from([
        5, 136, 0x06, 0x22, 0xa0, 0xff, 0xff, 0xf6, 0x00, 0x00, 0x64,
      ]);
      const [point] = decodeLpp(data);
      expect(point?.value).toEqual({
        kind: "gps",
        latitude: 40.208,
        longitude: -0.001,
        altitude: 1,
      });
    });

    it("should return an empty list for empty input", () => {
      expect(decodeLpp(new Uint8Array(0))).toEqual([]);
    });

    it("should stop at an unknown type code and keep earlier points", () => {
      const data = Uint8Array.from([1, 103, 0x00, 0xe1, 2, 0xee, 0x00, 3, 0, 1]);
      const points = decodeLpp(data);
      expect(points).toHaveLength(1);
      expect(points[0]?.channel).toBe(1);
    });

    it("should stop at a truncated value", () => {
      const data = Uint8Array.from([1, 0, 0x01, 2, 103, 0x00]);
      const points = decodeLpp(data);
      expect(points).toHaveLength(1);
      expect(points[0]?.type).toBe(LppSensorType.DIGITAL_INPUT);
    });

    it("should ignore a lone trailing byte", () => {
      expect(decodeLpp(Uint8Array.from([1, 0, 0x00, 7]))).toHaveLength(1);
    });

    it("should never throw on arbitrary prefixes of a valid frame", () => {
      const frame = new LppEncoder()
        .addTemperature(1, 21.5)
        .addGps(2, 51.5, -0.12, 30)
        .addColour(3, 1, 2, 3)
        .toBytes();
      for (let cut = 0; cut <= frame.length; cut++) {
        expect(() => decodeLpp(frame.subarray(0, cut))).not.toThrow();
      }
    });

    it("should keep the complete records before a cut-off final record", () => {
      const points: LppDataPoint[] = [
        { channel: 1, type: LppSensorType.TEMPERATURE, value: { kind: "float", value: 21.5 } },
        {
          channel: 2,
          type: LppSensorType.GPS,
          value: { kind: "gps", latitude: 51.5, longitude: -0.12, altitude: 30 },
        },
        { channel: 3, type: LppSensorType.COLOUR, value: { kind: "rgb", red: 1, green: 2, blue: 3 } },
      ];
      const frame = encodeLpp(points);
      // colour record: channel, type, three value bytes
      for (let cut = frame.length - 5; cut < frame.length; cut++) {
        expect(decodeLpp(frame.subarray(0, cut))).toEqual(points.slice(0, 2));
      }
      expect(decodeLpp(frame)).toEqual(points);
    });
  });

  describe("decodeLpp() then encodeLpp()", () => {
    const LOW = [0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09];
    const HIGH = [0xf1, 0x82, 0x93, 0xa4, 0xb5, 0xc6, 0xd7, 0xe8, 0xf9];
    // any nonzero byte decodes to `true`, which encodes back as 0x01
    const DIGITAL = new Set<number>([
      LppSensorType.DIGITAL_INPUT,
      LppSensorType.DIGITAL_OUTPUT,
      LppSensorType.PRESENCE,
      LppSensorType.SWITCH,
    ]);
    const rows = Object.values(LppSensorType).map((type) => ({ name: lppSensorName(type), type }));

    it("should cover every sensor type", () => {
      expect(rows).toHaveLength(27);
    });

    it.each(rows)("should reproduce $name records byte for byte", ({ type }) => {
      const width = lppValueSize(type) ?? 0;
      expect(width).toBeGreaterThan(0);
      const values = DIGITAL.has(type) ? [[0x01], [0x00]] : [LOW.slice(0, width), HIGH.slice(0, width)];
      const frame = Uint8Array.from(values.flatMap((value, i) => [7 + i, type, ...value]));

      expect(Array.from(encodeLpp(decodeLpp(frame)))).toEqual(Array.from(frame));
    });
  });

  describe("LppEncoder", () => {
    it("should encode temperature as signed tenths", () => {
      const bytes = new LppEncoder().addTemperature(1, -10).toBytes();
      expect(Array.from(bytes)).toEqual([1, 103, 0xff, 0x9c]);
    });

    it("should round to the nearest wire step", () => {
      // 21.55 * 10 = 215.5 → 216
      const bytes = new LppEncoder().addTemperature(0, 21.55).toBytes();
      expect(Array.from(bytes)).toEqual([0, 103, 0x00, 0xd8]);
    });

    it("should wrap values that overflow the field", () => {
      // 300 % → raw 600 → low byte 0x58
      const bytes = new LppEncoder().addHumidity(0, 300).toBytes();
      expect(Array.from(bytes)).toEqual([0, 104, 0x58]);
    });

    it("should track its length", () => {
      const encoder = new LppEncoder().addDigitalInput(0, true).addVoltage(1, 3.7);
      expect(encoder.length).toBe(7);
    });

    it("should zero-pad raw values to the type width", () => {
      const bytes = new LppEncoder()
        .addRaw(4, LppSensorType.TEMPERATURE, Uint8Array.from([0x01]))
        .toBytes();
      expect(Array.from(bytes)).toEqual([4, 103, 0x01, 0x00]);
    });

    it("should reject a value kind that does not fit the sensor", () => {
      const point: LppDataPoint = {
        channel: 0,
        type: LppSensorType.GPS,
        value: { kind: "float", value: 1 },
      };
      expect(() => new LppEncoder().add(point)).toThrow(TypeError);
    });

    it("should round-trip a mixed frame through decodeLpp", () => {
      const points: LppDataPoint[] = [
        { channel: 1, type: LppSensorType.TEMPERATURE, value: { kind: "float", value: 21.5 } },
        { channel: 2, type: LppSensorType.ILLUMINANCE, value: { kind: "integer", value: 480 } },
        { channel: 3, type: LppSensorType.ACCELEROMETER, value: { kind: "vector3", x: 0.5, y: -0.25, z: 1 } },
        { channel: 4, type: LppSensorType.COLOUR, value: { kind: "rgb", red: 255, green: 128, blue: 0 } },
        {
          channel: 5,
          type: LppSensorType.UNIX_TIME,
          value: { kind: "timestamp", value: 1700000000 as UnixTimestamp },
        },
      ];
      expect(decodeLpp(encodeLpp(points))).toEqual(points);
    });
  });

  describe("formatLppValue()", () => {
    it("should format scalars with their unit", () => {
      const [temp, lux] = decodeLpp(
        Uint8Array.from([1, 103, 0x00, 0xd7, 2, 101, 0x00, 0x30])
      );
      expect(temp && formatLppValue(temp)).toBe("21.5°C");
      expect(lux && formatLppValue(lux)).toBe("48 lux");
    });

    it("should format digital, colour and GPS values", () => {
      const [digital, colour, gps] = decodeLpp(
        new LppEncoder()
          .addDigitalOutput(0, false)
          .addColour(1, 10, 20, 30)
          .addGps(2, 51.5, -0.12, 30)
          .toBytes()
      );
      expect(digital && formatLppValue(digital)).toBe("Off");
      expect(colour && formatLppValue(colour)).toBe("RGB(10, 20, 30)");
      expect(gps && formatLppValue(gps)).toBe("51.500000, -0.120000 @ 30.0m");
    });

    it("should format timestamps as ISO strings", () => {
      const [point] = decodeLpp(
        new LppEncoder().addUnixTime(0, 0 as UnixTimestamp).toBytes()
      );
      expect(point && formatLppValue(point)).toBe("1970-01-01T00:00:00.000Z");
    });

    it("should format vectors per axis", () => {
      const [point] = decodeLpp(
        new LppEncoder().addAccelerometer(0, 0.5, -0.25, 1).toBytes()
      );
      expect(point && formatLppValue(point)).toBe("X:0.500 Y:-0.250 Z:1.000 g");
    });
  });

  describe("lppBatteryPercentage()", () => {
    const voltage = (value: number): LppDataPoint => ({
      channel: 0,
      type: LppSensorType.VOLTAGE,
      value: { kind: "float", value },
    });

    it("should map 3.0–4.2 V onto 0–100 %", () => {
      expect(lppBatteryPercentage(voltage(3.0))).toBe(0);
      expect(lppBatteryPercentage(voltage(3.6))).toBe(50);
      expect(lppBatteryPercentage(voltage(4.2))).toBe(100);
    });

    it("should clamp out-of-range voltages", () => {
      expect(lppBatteryPercentage(voltage(2.5))).toBe(0);
      expect(lppBatteryPercentage(voltage(5))).toBe(100);
    });

    it("should ignore non-voltage points", () => {
      expect(
        lppBatteryPercentage({
          channel: 0,
          type: LppSensorType.TEMPERATURE,
          value: { kind: "float", value: 4 },
        })
      ).toBeUndefined();
    });
  });
});
