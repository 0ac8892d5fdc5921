import {
  EUI48_LENGTH,
  EUI64_LENGTH,
  HSRP2_GROUP_HIGH_NIBBLE,
  HSRP2_PREFIX,
  HSRP_PREFIX,
  VRRP_PREFIX,
} from './constants.js';

// Control bits of the first octet
const GROUP_BIT = 0b00000001;
const LOCAL_BIT = 0b00000010;

function firstOctet(octets: Uint8Array) {
  const [first = 0] = octets;
  return first;
}

function hasPrefix(octets: Uint8Array, prefix: readonly number[]) {
  return prefix.every((byte, i) => octets[i] === byte);
}

export function isEui48(octets: Uint8Array) {
  return octets.length === EUI48_LENGTH;
}

export function isEui64(octets: Uint8Array) {
  return octets.length === EUI64_LENGTH;
}

/**
 * All octets are `0xff`.
 */
export function isBroadcast(octets: Uint8Array) {
  return octets.every((byte) => byte === 0xff);
}

/**
 * Group bit set, excluding the all-ones broadcast address.
 */
export function isMulticast(octets: Uint8Array) {
  return (firstOctet(octets) & GROUP_BIT) !== 0 && !isBroadcast(octets);
}

/**
 * Group bit clear.
 */
export function isUnicast(octets: Uint8Array) {
  return (firstOctet(octets) & GROUP_BIT) === 0;
}

/**
 * Locally administered bit (bit 1 of the first octet) set.
 */
export function isLocal(octets: Uint8Array) {
  return (firstOctet(octets) & LOCAL_BIT) !== 0;
}

export function isUniversal(octets: Uint8Array) {
  return !isLocal(octets);
}

/**
 * VRRP virtual router address `00-00-5E-00-01-XX`. EUI-48 only.
 */
export function isVrrp(octets: Uint8Array) {
  return isEui48(octets) && hasPrefix(octets, VRRP_PREFIX);
}

/**
 * HSRP virtual router address `00-00-0C-07-AC-XX`. EUI-48 only.
 */
export function isHsrp(octets: Uint8Array) {
  return isEui48(octets) && hasPrefix(octets, HSRP_PREFIX);
}

/**
 * HSRPv2 virtual router address `00-00-0C-9F-FX-XX`. EUI-48 only.
 */
export function isHsrp2(octets: Uint8Array) {
  const group = octets[HSRP2_PREFIX.length] ?? 0;

  return (
    isEui48(octets) &&
    hasPrefix(octets, HSRP2_PREFIX) &&
    (group & HSRP2_GROUP_HIGH_NIBBLE) === HSRP2_GROUP_HIGH_NIBBLE
  );
}
