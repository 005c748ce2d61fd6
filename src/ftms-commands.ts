/**
 * FTMS control point commands and trainer notification parsers
 * Commands follow format: [opcode, ...little-endian parameters]
 */

import { FTMS_OPCODES, FTMS_RESULT_MESSAGES } from './constants.js';
import type { SimulationCommand, TrainerCommand } from './types.js';
import { clamp } from './utils.js';

export function getRequestControlCommand(): Uint8Array {
  return new Uint8Array([FTMS_OPCODES.REQUEST_CONTROL]);
}

export function getResetCommand(): Uint8Array {
  return new Uint8Array([FTMS_OPCODES.RESET]);
}

/**
 * Set Target Resistance Level. One byte, whole percent, 0-100. Fractions are
 * dropped, not rounded.
 */
export function getSetResistanceCommand(percent: number): Uint8Array {
  const level = clamp(Math.trunc(percent), 0, 100);
  return new Uint8Array([FTMS_OPCODES.SET_TARGET_RESISTANCE, level]);
}

/**
 * Set Target Power (ERG). Signed 16-bit watts.
 */
export function getSetTargetPowerCommand(watts: number): Uint8Array {
  const command = new Uint8Array(3);
  const view = new DataView(command.buffer);
  view.setUint8(0, FTMS_OPCODES.SET_TARGET_POWER);
  view.setInt16(1, clamp(Math.round(watts), -32768, 32767), true);
  return command;
}

/**
 * Set Indoor Bike Simulation Parameters.
 * [0x11, wind sint16 (0.001 m/s), grade sint16 (0.01 %), crr uint8 (0.0001), cw uint8 (0.01 kg/m)]
 */
export function getSetSimulationCommand(params: Omit<SimulationCommand, 'kind'>): Uint8Array {
  const command = new Uint8Array(7);
  const view = new DataView(command.buffer);
  view.setUint8(0, FTMS_OPCODES.SET_INDOOR_BIKE_SIMULATION);
  view.setInt16(1, clamp(Math.round(params.windSpeedMps * 1000), -32768, 32767), true);
  view.setInt16(3, clamp(Math.round(params.gradePercent * 100), -32768, 32767), true);
  view.setUint8(5, clamp(Math.round(params.rollingResistance * 10000), 0, 255));
  view.setUint8(6, clamp(Math.round(params.windResistance * 100), 0, 255));
  return command;
}

export function buildTrainerCommand(command: TrainerCommand): Uint8Array {
  switch (command.kind) {
    case 'power':
      return getSetTargetPowerCommand(command.watts);
    case 'resistance':
      return getSetResistanceCommand(command.percent);
    case 'simulation':
      return getSetSimulationCommand(command);
  }
}

export interface ControlPointResponse {
  requestOpCode: number;
  resultCode: number;
  success: boolean;
  message: string;
}

/**
 * Parse a control point indication. Returns null for anything that is not a
 * response frame.
 */
export function parseControlPointResponse(data: Uint8Array): ControlPointResponse | null {
  if (data.length < 3 || data[0] !== FTMS_OPCODES.RESPONSE_CODE) {
    return null;
  }
  const resultCode = data[2];
  return {
    requestOpCode: data[1],
    resultCode,
    success: resultCode === 0x01,
    message: FTMS_RESULT_MESSAGES[resultCode] ?? `Unknown result code 0x${resultCode.toString(16).padStart(2, '0')}`
  };
}

export interface IndoorBikeData {
  speedKmh?: number;
  cadenceRpm?: number;
  resistanceLevel?: number;
  powerWatts?: number;
  heartRateBpm?: number;
}

// Byte widths of the optional fields that precede heart rate, in FTMS order
const INDOOR_BIKE_FIELDS: Array<{ flag: number; size: number; key?: keyof IndoorBikeData }> = [
  { flag: 0x0002, size: 2 },                          // average speed
  { flag: 0x0004, size: 2, key: 'cadenceRpm' },
  { flag: 0x0008, size: 2 },                          // average cadence
  { flag: 0x0010, size: 3 },                          // total distance
  { flag: 0x0020, size: 2, key: 'resistanceLevel' },
  { flag: 0x0040, size: 2, key: 'powerWatts' },
  { flag: 0x0080, size: 2 },                          // average power
  { flag: 0x0100, size: 5 },                          // expended energy
  { flag: 0x0200, size: 1, key: 'heartRateBpm' }
];

/**
 * Parse the Indoor Bike Data characteristic. Truncated frames yield the
 * fields read before the data ran out.
 */
export function parseIndoorBikeData(data: Uint8Array): IndoorBikeData {
  const result: IndoorBikeData = {};
  if (data.length < 2) {
    return result;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const flags = view.getUint16(0, true);
  let offset = 2;

  // Instantaneous speed is present when the "more data" bit is clear
  if (!(flags & 0x0001)) {
    if (offset + 2 > data.length) return result;
    result.speedKmh = view.getUint16(offset, true) / 100;
    offset += 2;
  }

  for (const field of INDOOR_BIKE_FIELDS) {
    if (!(flags & field.flag)) continue;
    if (offset + field.size > data.length) return result;

    switch (field.key) {
      case 'cadenceRpm':
        result.cadenceRpm = view.getUint16(offset, true) / 2;
        break;
      case 'resistanceLevel':
        result.resistanceLevel = view.getInt16(offset, true);
        break;
      case 'powerWatts':
        result.powerWatts = view.getInt16(offset, true);
        break;
      case 'heartRateBpm':
        result.heartRateBpm = view.getUint8(offset);
        break;
      default:
        break;
    }
    offset += field.size;
  }

  return result;
}
