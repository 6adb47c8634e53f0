/**
 * Kubernetes resource quantity parsing.
 *
 * CPU is normalized to cores ("500m" -> 0.5) and memory to bytes ("128Mi" -> 134217728).
 * Binary suffixes use 1024-based multipliers, decimal suffixes powers of ten.
 */

const BINARY_MULTIPLIERS: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6,
};

// Metrics-server reports K as well as the canonical k
const DECIMAL_MULTIPLIERS: Record<string, number> = {
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
};

const DECIMAL_DIVISORS: Record<string, number> = {
  n: 1e9,
  u: 1e6,
  m: 1e3,
};

const QUANTITY_PATTERN =
  /^([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)(Ki|Mi|Gi|Ti|Pi|Ei|n|u|m|k|K|M|G|T|P|E)?$/;

/**
 * Parse a quantity string into a plain number.
 * Returns null for empty or malformed input.
 */
export function parseQuantity(quantity: string | undefined | null): number | null {
  if (quantity === undefined || quantity === null) return null;
  const trimmed = quantity.trim();
  if (!trimmed) return null;

  const match = QUANTITY_PATTERN.exec(trimmed);
  if (!match) return null;

  const value = Number(match[1]);
  if (!Number.isFinite(value)) return null;

  const suffix = match[2];
  if (!suffix) return value;
  if (suffix in DECIMAL_DIVISORS) return value / DECIMAL_DIVISORS[suffix];
  if (suffix in BINARY_MULTIPLIERS) return value * BINARY_MULTIPLIERS[suffix];
  return value * DECIMAL_MULTIPLIERS[suffix];
}

/**
 * CPU quantity in cores. Negative readings count as missing.
 */
export function parseCpuCores(quantity: string | undefined | null): number | null {
  const value = parseQuantity(quantity);
  return value === null || value < 0 ? null : value;
}

/**
 * Memory quantity in whole bytes. Negative readings count as missing.
 */
export function parseMemoryBytes(quantity: string | undefined | null): number | null {
  const value = parseQuantity(quantity);
  return value === null || value < 0 ? null : Math.round(value);
}

export const BYTES_PER_GIB = 1024 ** 3;
export const BYTES_PER_MIB = 1024 ** 2;
