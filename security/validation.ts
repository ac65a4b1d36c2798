const UNSAFE_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/** Nesting limit for values coming from models and control scripts. */
export const MAX_DEPTH = 50;

export class UnsafeValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsafeValueError';
  }
}

/**
 * Rejects prototype-polluting keys, exotic prototypes and excessive nesting in
 * model-produced arguments and script outputs.
 */
export function assertSafeValue(value: unknown, label = 'value'): void {
  inspect(value, 0, label);
}

function inspect(value: unknown, depth: number, label: string): void {
  if (depth >= MAX_DEPTH) {
    throw new UnsafeValueError(`${label} exceeds maximum depth of ${MAX_DEPTH}`);
  }
  if (!value || typeof value !== 'object') {
    return;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) {
    throw new UnsafeValueError(`Unsafe ${label}`);
  }

  for (const key of Object.getOwnPropertyNames(value)) {
    if (UNSAFE_KEYS.has(key)) {
      throw new UnsafeValueError(`Unsafe ${label}`);
    }
    const nested: unknown = Reflect.get(value, key);
    inspect(nested, depth + 1, label);
  }
}
