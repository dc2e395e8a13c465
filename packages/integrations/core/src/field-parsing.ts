/**
 * Defensive field parsing for loosely typed vendor payloads.
 *
 * Nothing here throws: a value that cannot be read becomes null.
 */

import type { Measured } from '@essbridge/shared-types';

export type RawPayload = Record<string, unknown>;

export function isRawPayload(value: unknown): value is RawPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Numbers and numeric strings; anything else is unknown
 */
export function readNumber(payload: RawPayload, field: string): Measured {
  const raw = payload[field];

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

export function readString(payload: RawPayload, field: string): string | null {
  const raw = payload[field];

  if (typeof raw === 'string' && raw.trim() !== '') {
    return raw.trim();
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return String(raw);
  }

  return null;
}

/**
 * 1 = closed/on; other numbers are off
 */
export function readFlag(payload: RawPayload, field: string): boolean | null {
  const value = readNumber(payload, field);
  return value === null ? null : Math.trunc(value) === 1;
}

const PRECISION = 1e6;

function round(value: number): number {
  const rounded = Math.round(value * PRECISION) / PRECISION;
  // no negative zero
  return rounded === 0 ? 0 : rounded;
}

/**
 * Multiplies and rounds to 6 decimals, so 0.57 * 100 reads as 57
 */
export function scale(value: Measured, factor: number): Measured {
  return value === null ? null : round(value * factor);
}

export function perThousand(value: Measured): Measured {
  return value === null ? null : round(value / 1000);
}

export function clampPercent(value: Measured): Measured {
  if (value === null) return null;
  return Math.min(100, Math.max(0, value));
}

/**
 * Reads `field(1)..field(arity)` positionally. Missing slots stay null.
 */
export function readSeries(
  payload: RawPayload,
  arity: number,
  field: (position: number) => string,
): Measured[] {
  const values: Measured[] = [];
  for (let position = 1; position <= arity; position++) {
    values.push(readNumber(payload, field(position)));
  }
  return values;
}

/**
 * Epoch milliseconds (seconds are promoted) or a parseable date string.
 * Numeric values are never read as date strings.
 */
export function readTimestamp(payload: RawPayload, ...fields: string[]): Date | null {
  for (const field of fields) {
    const raw = payload[field];

    const numeric = readNumber(payload, field);
    if (numeric !== null) {
      const date = new Date(numeric < 1e12 ? numeric * 1000 : numeric);
      if (numeric > 0 && !Number.isNaN(date.getTime())) {
        return date;
      }
      continue;
    }

    if (typeof raw === 'string' && raw.trim() !== '') {
      const parsed = new Date(raw.trim());
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }
  }

  return null;
}
