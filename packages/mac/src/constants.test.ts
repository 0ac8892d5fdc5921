import { describe, expect, test } from 'vitest';
import { BIT_REVERSAL_TABLE } from './constants.js';

describe('BIT_REVERSAL_TABLE', () => {
  test('has an entry for every byte', () => {
    expect(BIT_REVERSAL_TABLE).toHaveLength(256);
  });

  test('maps bytes to their bit-reversed value', () => {
    expect(BIT_REVERSAL_TABLE.slice(0, 8)).toEqual([
      0x00, 0x80, 0x40, 0xc0, 0x20, 0xa0, 0x60, 0xe0,
    ]);
    expect(BIT_REVERSAL_TABLE[0x5a]).toBe(0x5a);
    expect(BIT_REVERSAL_TABLE[0xbc]).toBe(0x3d);
    expect(BIT_REVERSAL_TABLE[0x96]).toBe(0x69);
    expect(BIT_REVERSAL_TABLE[0xff]).toBe(0xff);
  });

  test('is frozen', () => {
    expect(Object.isFrozen(BIT_REVERSAL_TABLE)).toBe(true);
  });
});
