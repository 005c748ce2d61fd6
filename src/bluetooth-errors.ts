// Bluetooth HCI status codes seen on connect and link loss
// Based on Bluetooth Core Specification, Vol 1 Part F

const HCI_ERROR_CODES: Record<number, string> = {
  0x02: 'Unknown Connection Identifier',
  0x04: 'Page Timeout',
  0x05: 'Authentication Failure',
  0x06: 'PIN or Key Missing',
  0x08: 'Connection Timeout',
  0x09: 'Connection Limit Exceeded',
  0x0C: 'Command Disallowed',
  0x0D: 'Connection Rejected due to Limited Resources',
  0x13: 'Remote User Terminated Connection',
  0x14: 'Remote Device Terminated Connection due to Low Resources',
  0x15: 'Remote Device Terminated Connection due to Power Off',
  0x16: 'Connection Terminated By Local Host',
  0x22: 'LMP Response Timeout / LL Response Timeout',
  0x3B: 'Unacceptable Connection Parameters',
  0x3D: 'Connection Terminated due to MIC Failure',
  0x3E: 'Connection Failed to be Established',
};

function lookup(code: number): string {
  return HCI_ERROR_CODES[code] ?? `Unknown Bluetooth error code: ${code}`;
}

/**
 * Readable text for whatever the stack hands us: a status code, an Error,
 * an object carrying a numeric `code`, or a string.
 */
export function translateBluetoothError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'number') {
    return lookup(error);
  }

  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code: unknown = error.code;
    if (typeof code === 'number') {
      return lookup(code);
    }
  }

  const errorStr = error === undefined || error === null ? '' : String(error);
  const codeMatch = errorStr.match(/\b(\d+)\b/);
  if (codeMatch) {
    const code = parseInt(codeMatch[1], 10);
    if (HCI_ERROR_CODES[code]) {
      return HCI_ERROR_CODES[code];
    }
  }

  return errorStr || 'Unknown error';
}
