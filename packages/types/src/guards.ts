/**
 * Runtime type guards used at the edges of the simulator: configuration
 * files, CLI flags and values handed in by external drivers.
 */

// ─── Type Guards ────────────────────────────────────────────────────────────────

/** `true` if `value` is a string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** `true` if `value` is a finite integer `>= 0`. */
export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * `true` if `value` is a plain object (not an array, null, or an instance of
 * a class).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ─── JSON input ─────────────────────────────────────────────────────────────────

const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function assertNoDangerousKeys(obj: unknown): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item);
    }
    return;
  }

  for (const [key, nested] of Object.entries(obj)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new Error(`Potentially dangerous key "${key}" detected in JSON input`);
    }
    assertNoDangerousKeys(nested);
  }
}

/**
 * Parse a JSON string, rejecting prototype-pollution keys anywhere in the
 * result.
 *
 * @throws Error if parsing fails or a dangerous key is present.
 */
export function sanitizeJsonInput(value: string): unknown {
  const parsed: unknown = JSON.parse(value);
  assertNoDangerousKeys(parsed);
  return parsed;
}

// ─── Deep Freeze ────────────────────────────────────────────────────────────────

/**
 * Deeply freeze arrays and plain objects. Sets and Maps are left as they are;
 * callers that hold them must not expose mutating access.
 */
export function freezeDeep<T>(obj: T): Readonly<T> {
  if (obj === null || typeof obj !== 'object' || Object.isFrozen(obj)) {
    return obj;
  }

  Object.freeze(obj);

  if (Array.isArray(obj)) {
    for (const item of obj) {
      freezeDeep(item);
    }
  } else if (isPlainObject(obj)) {
    for (const value of Object.values(obj)) {
      freezeDeep(value);
    }
  }

  return obj;
}

// ─── Exhaustiveness Check ───────────────────────────────────────────────────────

/**
 * Place in the `default` branch of a `switch` over a union to get a
 * compile-time error for unhandled members.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
