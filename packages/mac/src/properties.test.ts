import { describe, expect, test } from 'vitest';
import {
  isBroadcast,
  isEui48,
  isEui64,
  isHsrp,
  isHsrp2,
  isLocal,
  isMulticast,
  isUnicast,
  isUniversal,
  isVrrp,
} from './properties.js';

const unicast = new Uint8Array([0x00, 0x11, 0x22, 0xaa, 0xbb, 0xcc]);
const multicast = new Uint8Array([0x01, 0x00, 0x5e, 0x00, 0x00, 0x01]);
const broadcast = new Uint8Array(6).fill(0xff);
const local = new Uint8Array([0x02, 0x00, 0x00, 0x00, 0x00, 0x01]);
const eui64 = new Uint8Array([0x00, 0x11, 0x22, 0xff, 0xfe, 0xaa, 0xbb, 0xcc]);

describe('isEui48 / isEui64', () => {
  test('classify by octet count', () => {
    expect(isEui48(unicast)).toBe(true);
    expect(isEui64(unicast)).toBe(false);
    expect(isEui48(eui64)).toBe(false);
    expect(isEui64(eui64)).toBe(true);
  });
});

describe('isBroadcast', () => {
  test('requires every octet to be ff', () => {
    expect(isBroadcast(broadcast)).toBe(true);
    expect(isBroadcast(new Uint8Array(8).fill(0xff))).toBe(true);
    expect(isBroadcast(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xfe])))
      .toBe(false);
  });
});

describe('isMulticast', () => {
  test('is true when the group bit is set', () => {
    expect(isMulticast(multicast)).toBe(true);
    expect(isMulticast(new Uint8Array([0x33, 0x33, 0, 0, 0, 0x01]))).toBe(
      true
    );
  });

  test('is false for unicast addresses', () => {
    expect(isMulticast(unicast)).toBe(false);
  });

  test('is false for broadcast', () => {
    expect(isMulticast(broadcast)).toBe(false);
  });
});

describe('isUnicast', () => {
  test('is true when the group bit is clear', () => {
    expect(isUnicast(unicast)).toBe(true);
    expect(isUnicast(local)).toBe(true);
  });

  test('is false for multicast and broadcast', () => {
    expect(isUnicast(multicast)).toBe(false);
    expect(isUnicast(broadcast)).toBe(false);
  });

  test('only looks at the lowest bit of the first octet', () => {
    expect(isUnicast(new Uint8Array([0xfe, 0xff, 0xff, 0xff, 0xff, 0xff])))
      .toBe(true);
  });
});

describe('isLocal / isUniversal', () => {
  test('follow the locally administered bit', () => {
    expect(isLocal(local)).toBe(true);
    expect(isUniversal(local)).toBe(false);
    expect(isLocal(unicast)).toBe(false);
    expect(isUniversal(unicast)).toBe(true);
  });
});

describe('isVrrp', () => {
  test('matches 00-00-5E-00-01-XX', () => {
    expect(isVrrp(new Uint8Array([0x00, 0x00, 0x5e, 0x00, 0x01, 0x0a]))).toBe(
      true
    );
    expect(isVrrp(new Uint8Array([0x00, 0x00, 0x5e, 0x00, 0x02, 0x0a]))).toBe(
      false
    );
  });

  test('is false for eui-64', () => {
    expect(
      isVrrp(new Uint8Array([0x00, 0x00, 0x5e, 0x00, 0x01, 0x0a, 0x00, 0x00]))
    ).toBe(false);
  });
});

describe('isHsrp', () => {
  test('matches 00-00-0C-07-AC-XX', () => {
    expect(isHsrp(new Uint8Array([0x00, 0x00, 0x0c, 0x07, 0xac, 0x01]))).toBe(
      true
    );
    expect(isHsrp(new Uint8Array([0x00, 0x00, 0x0c, 0x07, 0xad, 0x01]))).toBe(
      false
    );
  });
});

describe('isHsrp2', () => {
  test('matches 00-00-0C-9F-FX-XX', () => {
    expect(isHsrp2(new Uint8Array([0x00, 0x00, 0x0c, 0x9f, 0xf0, 0x01]))).toBe(
      true
    );
    expect(isHsrp2(new Uint8Array([0x00, 0x00, 0x0c, 0x9f, 0xff, 0xff]))).toBe(
      true
    );
  });

  test('rejects group numbers outside 0xF000-0xFFFF', () => {
    expect(isHsrp2(new Uint8Array([0x00, 0x00, 0x0c, 0x9f, 0x0f, 0x01]))).toBe(
      false
    );
    expect(isHsrp2(new Uint8Array([0x00, 0x00, 0x0c, 0x9f, 0xe0, 0x01]))).toBe(
      false
    );
  });

  test('is false for eui-64', () => {
    expect(
      isHsrp2(new Uint8Array([0x00, 0x00, 0x0c, 0x9f, 0xf0, 0x01, 0x00, 0x00]))
    ).toBe(false);
  });
});
