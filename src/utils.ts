import { readFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function formatHex(data: Uint8Array | Buffer): string {
  const bytes = data instanceof Buffer ? data : Buffer.from(data);
  return bytes.toString('hex').toUpperCase().match(/.{2}/g)?.join(' ') || '';
}

export function normalizeLogLevel(level: string | undefined): LogLevel {
  const normalized = (level || 'info').toLowerCase();

  switch (normalized) {
    case 'debug':
    case 'verbose':
    case 'trace':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      console.warn(`[Config] Unknown log level '${level}', defaulting to info`);
      return 'info';
  }
}

interface PackageMetadata {
  name: string;
  version: string;
  description: string;
}

let cachedMetadata: PackageMetadata | null = null;

export function getPackageMetadata(): PackageMetadata {
  if (!cachedMetadata) {
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    const field = (key: string): string => {
      if (typeof pkg === 'object' && pkg !== null && key in pkg) {
        const value: unknown = Reflect.get(pkg, key);
        return typeof value === 'string' ? value : '';
      }
      return '';
    };
    cachedMetadata = {
      name: field('name'),
      version: field('version'),
      description: field('description')
    };
  }
  return cachedMetadata;
}

const BLUETOOTH_BASE_SUFFIX = '00001000800000805f9b34fb';

function dashed(clean: string): string {
  return `${clean.substring(0,8)}-${clean.substring(8,12)}-${clean.substring(12,16)}-${clean.substring(16,20)}-${clean.substring(20)}`;
}

/**
 * Every spelling a platform may report for the same UUID: 16-bit short form,
 * 128-bit without dashes and 128-bit with dashes. Lower case throughout.
 */
export function expandUuidVariants(uuid: string): string[] {
  const clean = uuid.toLowerCase().replace(/-/g, '');
  const variants: string[] = [];

  if (clean.length === 4) {
    variants.push(clean);                                    // '2ad9'
    const fullUuid = `0000${clean}${BLUETOOTH_BASE_SUFFIX}`;
    variants.push(fullUuid);
    variants.push(dashed(fullUuid));
  } else if (clean.length === 32) {
    if (clean.endsWith(BLUETOOTH_BASE_SUFFIX) && clean.startsWith('0000')) {
      variants.push(clean.substring(4, 8));
    }
    variants.push(clean);
    variants.push(dashed(clean));
  } else {
    variants.push(clean);
  }

  return [...new Set(variants)];
}

export function uuidMatches(reported: string, expected: string): boolean {
  const reportedVariants = expandUuidVariants(reported);
  return expandUuidVariants(expected).some(variant => reportedVariants.includes(variant));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a timer. The timer is always cleared so a settled
 * operation never keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage = 'Operation timeout'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
      })
    ]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
