/**
 * @module types/device
 * @description Records describing the local radio itself.
 */

import type { ChannelSecret, PublicKey } from "./branded.js";

/** Reply to the `appStart` handshake. */
export interface SelfInfo {
  readonly advertisementType: number;
  readonly txPower: number;
  readonly maxTxPower: number;
  readonly publicKey: PublicKey;
  readonly latitude: number;
  readonly longitude: number;
  readonly multiAcks: number;
  readonly advertisementLocationPolicy: number;
  readonly telemetryModeBase: number;
  readonly telemetryModeLocation: number;
  readonly telemetryModeEnvironment: number;
  readonly manualAddContacts: boolean;
  /** MHz. */
  readonly radioFrequency: number;
  /** kHz. */
  readonly radioBandwidth: number;
  readonly radioSpreadingFactor: number;
  readonly radioCodingRate: number;
  readonly name: string;
}

export interface DeviceInfo {
  readonly firmwareVersion: number;
  /** The remaining fields are only reported by firmware v3 and later. */
  readonly maxContacts: number;
  readonly maxChannels: number;
  readonly blePin: number;
  readonly firmwareBuild: string;
  readonly model: string;
  readonly version: string;
}

export interface BatteryInfo {
  /** Millivolts. */
  readonly level: number;
  readonly usedStorageKb?: number;
  readonly totalStorageKb?: number;
}

export interface ChannelInfo {
  readonly index: number;
  readonly name: string;
  readonly secret: ChannelSecret;
}

export interface CoreStats {
  readonly batteryMv: number;
  readonly uptimeSeconds: number;
  readonly errors: number;
  readonly queueLength: number;
}

export interface RadioStats {
  readonly noiseFloor: number;
  readonly lastRssi: number;
  readonly lastSnr: number;
  readonly txAirtimeSeconds: number;
  readonly rxAirtimeSeconds: number;
}

export interface PacketStats {
  readonly received: number;
  readonly sent: number;
  readonly floodTx: number;
  readonly directTx: number;
  readonly floodRx: number;
  readonly directRx: number;
}

/** Radio parameters for `setRadio`. */
export interface RadioSettings {
  /** MHz, e.g. 869.525. */
  readonly frequency: number;
  /** kHz, e.g. 250. */
  readonly bandwidth: number;
  readonly spreadingFactor: number;
  readonly codingRate: number;
}

export interface OtherParams {
  readonly manualAddContacts: boolean;
  readonly telemetryModeBase: number;
  readonly telemetryModeLocation: number;
  readonly telemetryModeEnvironment: number;
  readonly advertisementLocationPolicy: number;
  readonly multiAcks: number;
}
