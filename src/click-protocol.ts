/**
 * Shift controller notification decoding.
 *
 * Button status frames carry a protobuf message: varint field 1 is the plus
 * button, field 2 the minus button, 0 = pressed and 1 = released. Frames may
 * be prefixed with a one-byte message type.
 */

import { CLICK_MESSAGE_TYPES } from './constants.js';
import { NotificationDecodeError } from './errors.js';
import type { ShiftDirection } from './types.js';

export type ButtonName = 'plus' | 'minus';

export const BUTTON_PRESSED = 0;
export const BUTTON_RELEASED = 1;

const BUTTON_FIELDS: Record<number, ButtonName> = {
  1: 'plus',
  2: 'minus'
};

const BUTTON_DIRECTIONS: Record<ButtonName, ShiftDirection> = {
  plus: 'up',
  minus: 'down'
};

export type ButtonStates = Partial<Record<ButtonName, number>>;

function readVarint(data: Uint8Array, offset: number, payload: Uint8Array): { value: number; next: number } {
  let value = 0;
  let multiplier = 1;
  for (let i = 0; i < 10; i++) {
    const index = offset + i;
    if (index >= data.length) {
      throw new NotificationDecodeError('Truncated varint', payload);
    }
    const byte = data[index];
    value += (byte & 0x7f) * multiplier;
    if ((byte & 0x80) === 0) {
      return { value, next: index + 1 };
    }
    multiplier *= 128;
  }
  throw new NotificationDecodeError('Varint longer than 10 bytes', payload);
}

function skipBytes(data: Uint8Array, offset: number, count: number, payload: Uint8Array): number {
  const next = offset + count;
  if (next > data.length) {
    throw new NotificationDecodeError('Truncated field', payload);
  }
  return next;
}

function parseButtonFields(body: Uint8Array, payload: Uint8Array): ButtonStates {
  const states: ButtonStates = {};
  let offset = 0;

  while (offset < body.length) {
    const tag = readVarint(body, offset, payload);
    offset = tag.next;
    const fieldNumber = Math.floor(tag.value / 8);
    const wireType = tag.value & 0x07;

    if (fieldNumber === 0) {
      throw new NotificationDecodeError('Invalid field number 0', payload);
    }

    const button = BUTTON_FIELDS[fieldNumber];
    if (button !== undefined && wireType !== 0) {
      throw new NotificationDecodeError(`Button field ${fieldNumber} has wire type ${wireType}`, payload);
    }

    switch (wireType) {
      case 0: {
        const field = readVarint(body, offset, payload);
        offset = field.next;
        if (button !== undefined) {
          states[button] = field.value;
        }
        break;
      }
      case 1:
        offset = skipBytes(body, offset, 8, payload);
        break;
      case 2: {
        const length = readVarint(body, offset, payload);
        offset = skipBytes(body, length.next, length.value, payload);
        break;
      }
      case 5:
        offset = skipBytes(body, offset, 4, payload);
        break;
      default:
        throw new NotificationDecodeError(`Unsupported wire type ${wireType}`, payload);
    }
  }

  return states;
}

/**
 * Decode one notification into button states. Returns null for frames that
 * carry no button information (battery, idle).
 */
export function decodeButtonStatus(payload: Uint8Array): ButtonStates | null {
  if (payload.length === 0) {
    throw new NotificationDecodeError('Empty notification', payload);
  }

  const messageType = payload[0];
  if (messageType === CLICK_MESSAGE_TYPES.BATTERY_LEVEL || messageType === CLICK_MESSAGE_TYPES.IDLE) {
    return null;
  }

  const body = messageType === CLICK_MESSAGE_TYPES.BUTTON_STATUS ? payload.subarray(1) : payload;
  const states = parseButtonFields(body, payload);

  if (states.plus === undefined && states.minus === undefined) {
    throw new NotificationDecodeError('No button fields in notification', payload);
  }
  return states;
}

/**
 * Tracks button state for one controller and reports a shift on each
 * pressed -> released edge.
 */
export class ClickButtonTracker {
  private states: Record<ButtonName, number> = {
    plus: BUTTON_RELEASED,
    minus: BUTTON_RELEASED
  };

  /**
   * @throws NotificationDecodeError for malformed payloads; button state is left untouched
   */
  process(payload: Uint8Array): ShiftDirection[] {
    const decoded = decodeButtonStatus(payload);
    if (!decoded) {
      return [];
    }

    const shifts: ShiftDirection[] = [];
    for (const button of ['plus', 'minus'] as const) {
      const next = decoded[button];
      if (next === undefined || next === this.states[button]) {
        continue;
      }
      if (this.states[button] === BUTTON_PRESSED && next !== BUTTON_PRESSED) {
        shifts.push(BUTTON_DIRECTIONS[button]);
      }
      this.states[button] = next;
    }
    return shifts;
  }

  reset(): void {
    this.states = { plus: BUTTON_RELEASED, minus: BUTTON_RELEASED };
  }
}
