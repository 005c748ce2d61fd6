/**
 * GATT identifiers and protocol constants for the trainer (FTMS) and the
 * shift controllers.
 */

import type { DeviceRole } from './types.js';

export const FTMS_SERVICE_UUID = '1826';
export const FTMS_CONTROL_POINT_UUID = '2ad9';
export const INDOOR_BIKE_DATA_UUID = '2ad2';

export const CLICK_SERVICE_UUID = '00000001-19ca-4651-86e5-fa29dcdd09d1';
export const CLICK_ASYNC_CHARACTERISTIC_UUID = '00000002-19ca-4651-86e5-fa29dcdd09d1';

export const FTMS_OPCODES = {
  REQUEST_CONTROL: 0x00,
  RESET: 0x01,
  SET_TARGET_RESISTANCE: 0x04,
  SET_TARGET_POWER: 0x05,
  SET_INDOOR_BIKE_SIMULATION: 0x11,
  RESPONSE_CODE: 0x80
} as const;

export const FTMS_RESULT_MESSAGES: Record<number, string> = {
  0x01: 'Success',
  0x02: 'Op code not supported',
  0x03: 'Invalid parameter',
  0x04: 'Operation failed',
  0x05: 'Control not permitted'
};

export const CLICK_MESSAGE_TYPES = {
  BUTTON_STATUS: 0x37,
  BATTERY_LEVEL: 0x19,
  IDLE: 0x15
} as const;

export interface RoleProfile {
  serviceUuid: string;
  characteristicUuids: string[];
}

export const ROLE_PROFILES: Record<DeviceRole, RoleProfile> = {
  trainer: {
    serviceUuid: FTMS_SERVICE_UUID,
    characteristicUuids: [FTMS_CONTROL_POINT_UUID, INDOOR_BIKE_DATA_UUID]
  },
  left_controller: {
    serviceUuid: CLICK_SERVICE_UUID,
    characteristicUuids: [CLICK_ASYNC_CHARACTERISTIC_UUID]
  },
  right_controller: {
    serviceUuid: CLICK_SERVICE_UUID,
    characteristicUuids: [CLICK_ASYNC_CHARACTERISTIC_UUID]
  }
};
