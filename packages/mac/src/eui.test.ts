import { describe, expect, test } from 'vitest';
import { eui48ToEui64, eui64ToEui48, isDerivedFromEui48 } from './eui.js';

const eui48 = new Uint8Array([0x00, 0x11, 0x22, 0xaa, 0xbb, 0xcc]);
const eui64 = new Uint8Array([0x00, 0x11, 0x22, 0xff, 0xfe, 0xaa, 0xbb, 0xcc]);

describe('eui48ToEui64', () => {
  test('inserts ff:fe after the oui', () => {
    expect(eui48ToEui64(eui48)).toEqual(eui64);
  });

  test('does not modify the input', () => {
    eui48ToEui64(eui48);
    expect(eui48).toEqual(
      new Uint8Array([0x00, 0x11, 0x22, 0xaa, 0xbb, 0xcc])
    );
  });

  test('throws for eui-64 input', () => {
    expect(() => eui48ToEui64(eui64)).toThrow('address is already eui-64');
  });
});

describe('isDerivedFromEui48', () => {
  test('accepts ff:fe and ff:ff fillers', () => {
    expect(isDerivedFromEui48(eui64)).toBe(true);
    expect(
      isDerivedFromEui48(
        new Uint8Array([0x00, 0x11, 0x22, 0xff, 0xff, 0xaa, 0xbb, 0xcc])
      )
    ).toBe(true);
  });

  test('rejects other eui-64 addresses', () => {
    expect(
      isDerivedFromEui48(
        new Uint8Array([0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77])
      )
    ).toBe(false);
  });

  test('is false for eui-48', () => {
    expect(isDerivedFromEui48(eui48)).toBe(false);
  });
});

describe('eui64ToEui48', () => {
  test('removes the filler', () => {
    expect(eui64ToEui48(eui64)).toEqual(eui48);
  });

  test('reverses eui48ToEui64', () => {
    expect(eui64ToEui48(eui48ToEui64(eui48))).toEqual(eui48);
  });

  test('returns a copy of eui-48 input', () => {
    const converted = eui64ToEui48(eui48);
    expect(converted).toEqual(eui48);
    expect(converted).not.toBe(eui48);
  });

  test('throws for eui-64 not derived from eui-48', () => {
    expect(() =>
      eui64ToEui48(
        new Uint8Array([0x00, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77])
      )
    ).toThrow('eui-64 address is not derived from an eui-48 address');
  });
});
