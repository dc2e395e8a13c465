import { describe, it, expect } from '@jest/globals';
import {
  clampPercent,
  isRawPayload,
  perThousand,
  readFlag,
  readNumber,
  readSeries,
  readString,
  readTimestamp,
  scale,
} from '../field-parsing';

describe('readNumber', () => {
  it('should read numbers and numeric strings', () => {
    const payload = { a: 12.5, b: '-480', c: ' 3 ' };
    expect(readNumber(payload, 'a')).toBe(12.5);
    expect(readNumber(payload, 'b')).toBe(-480);
    expect(readNumber(payload, 'c')).toBe(3);
  });

  it('should return null for missing or unparsable values', () => {
    const payload = { empty: '', text: 'n/a', nan: Number.NaN, nested: { v: 1 }, flag: true };
    expect(readNumber(payload, 'missing')).toBeNull();
    expect(readNumber(payload, 'empty')).toBeNull();
    expect(readNumber(payload, 'text')).toBeNull();
    expect(readNumber(payload, 'nan')).toBeNull();
    expect(readNumber(payload, 'nested')).toBeNull();
    expect(readNumber(payload, 'flag')).toBeNull();
  });

  it('should keep an explicit zero', () => {
    expect(readNumber({ v: '0' }, 'v')).toBe(0);
  });
});

describe('readString', () => {
  it('should trim strings and stringify numbers', () => {
    expect(readString({ sn: '  INV-1 ' }, 'sn')).toBe('INV-1');
    expect(readString({ sn: 42 }, 'sn')).toBe('42');
    expect(readString({ sn: '   ' }, 'sn')).toBeNull();
  });
});

describe('readFlag', () => {
  it('should treat 1 as on and other numbers as off', () => {
    expect(readFlag({ r: 1 }, 'r')).toBe(true);
    expect(readFlag({ r: '1' }, 'r')).toBe(true);
    expect(readFlag({ r: 0 }, 'r')).toBe(false);
    expect(readFlag({ r: 2 }, 'r')).toBe(false);
    expect(readFlag({}, 'r')).toBeNull();
  });
});

describe('scale and unit helpers', () => {
  it('should flip signs without producing negative zero', () => {
    expect(scale(1500, -1)).toBe(-1500);
    expect(Object.is(scale(0, -1), 0)).toBe(true);
    expect(scale(null, -1)).toBeNull();
  });

  it('should round away floating point noise', () => {
    expect(scale(0.57, 100)).toBe(57);
  });

  it('should convert W to kW', () => {
    expect(perThousand(-1500)).toBe(-1.5);
    expect(perThousand(null)).toBeNull();
  });

  it('should clamp percentages to 0..100', () => {
    expect(clampPercent(104)).toBe(100);
    expect(clampPercent(-3)).toBe(0);
    expect(clampPercent(55)).toBe(55);
    expect(clampPercent(null)).toBeNull();
  });
});

describe('readSeries', () => {
  it('should read positional fields and leave missing slots null', () => {
    const payload = { pack1V: '51.2', pack3V: 51.3 };
    expect(readSeries(payload, 4, (n) => `pack${n}V`)).toEqual([51.2, null, 51.3, null]);
  });
});

describe('readTimestamp', () => {
  it('should read epoch milliseconds', () => {
    expect(readTimestamp({ ts: 1760000000000 }, 'ts')?.toISOString()).toBe('2025-10-09T08:53:20.000Z');
  });

  it('should promote epoch seconds', () => {
    expect(readTimestamp({ ts: '1760000000' }, 'ts')?.toISOString()).toBe('2025-10-09T08:53:20.000Z');
  });

  it('should fall back to the next field and to date strings', () => {
    const payload = { dataTimeTs: null, dataTime: '2025-10-09T08:53:20Z' };
    expect(readTimestamp(payload, 'dataTimeTs', 'dataTime')?.toISOString()).toBe('2025-10-09T08:53:20.000Z');
  });

  it('should return null when nothing is readable', () => {
    expect(readTimestamp({ dataTime: 'yesterday-ish' }, 'dataTimeTs', 'dataTime')).toBeNull();
  });

  it('should reject epochs outside the date range', () => {
    expect(readTimestamp({ ts: 9e15 }, 'ts')).toBeNull();
  });

  it('should not read numeric strings as dates', () => {
    expect(readTimestamp({ ts: '0' }, 'ts')).toBeNull();
    expect(readTimestamp({ ts: '-5' }, 'ts')).toBeNull();
  });

  it('should move on to the next field after an unusable epoch', () => {
    const payload = { dataTimeTs: 9e15, dataTime: '2025-10-09T08:53:20Z' };
    expect(readTimestamp(payload, 'dataTimeTs', 'dataTime')?.toISOString()).toBe('2025-10-09T08:53:20.000Z');
  });
});

describe('isRawPayload', () => {
  it('should accept plain objects only', () => {
    expect(isRawPayload({})).toBe(true);
    expect(isRawPayload([])).toBe(false);
    expect(isRawPayload(null)).toBe(false);
    expect(isRawPayload('x')).toBe(false);
  });
});
