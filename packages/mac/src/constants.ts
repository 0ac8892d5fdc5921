import { reverseBits } from './util.js';

export const EUI48_LENGTH = 6;
export const EUI64_LENGTH = 8;

export const EUI48_HEX_LENGTH = EUI48_LENGTH * 2;
export const EUI64_HEX_LENGTH = EUI64_LENGTH * 2;

// Bytes inserted between the OUI and the device part when
// an EUI-48 is encapsulated in an EUI-64
export const EUI64_FILLER = [0xff, 0xfe] as const;

// Virtual Router Redundancy Protocol (RFC 5798): 00-00-5E-00-01-XX
export const VRRP_PREFIX = [0x00, 0x00, 0x5e, 0x00, 0x01] as const;

// Cisco Hot Standby Router Protocol v1: 00-00-0C-07-AC-XX
export const HSRP_PREFIX = [0x00, 0x00, 0x0c, 0x07, 0xac] as const;

// Cisco Hot Standby Router Protocol v2: 00-00-0C-9F-FX-XX
export const HSRP2_PREFIX = [0x00, 0x00, 0x0c, 0x9f] as const;
export const HSRP2_GROUP_HIGH_NIBBLE = 0xf0;

/**
 * Maps every byte to its bit-reversed value, as used by
 * Token Ring (IEEE 802.5) which transmits the most significant bit first.
 *
 * Computed once and shared.
 */
export const BIT_REVERSAL_TABLE: readonly number[] = Object.freeze(
  Array.from({ length: 256 }, (_, byte) => reverseBits(byte))
);
