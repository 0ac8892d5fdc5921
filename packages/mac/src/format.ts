import { BIT_REVERSAL_TABLE } from './constants.js';
import { eui48ToEui64 } from './eui.js';
import { isEui48 } from './properties.js';
import { chunk, toHex } from './util.js';

function hexOctets(octets: Uint8Array, width = 2) {
  return Array.from(octets, (byte) => toHex(byte, width));
}

function splitHalves(octets: Uint8Array) {
  const middle = octets.length / 2;
  return [
    formatBasic(octets.subarray(0, middle)),
    formatBasic(octets.subarray(middle)),
  ];
}

/**
 * Zero padded hex without delimiters.
 *
 * @example '001122aabbcc'
 */
export function formatBasic(octets: Uint8Array) {
  return hexOctets(octets).join('');
}

/**
 * Cisco Broadband Provisioning Registrar: `1,<octet count>,` followed by
 * colon delimited octets.
 *
 * @example '1,6,00:11:22:aa:bb:cc'
 */
export function formatBpr(octets: Uint8Array) {
  return `1,${octets.length},${formatMicrosoft(octets)}`;
}

/**
 * Dot after every 4 hex characters.
 *
 * @example '0011.22aa.bbcc'
 */
export function formatCisco(octets: Uint8Array) {
  return chunk(formatBasic(octets), 4).join('.');
}

/**
 * @example '00-11-22-aa-bb-cc'
 */
export function formatIeee(octets: Uint8Array) {
  return hexOctets(octets).join('-');
}

/**
 * @example '00:11:22:aa:bb:cc'
 */
export function formatMicrosoft(octets: Uint8Array) {
  return hexOctets(octets).join(':');
}

/**
 * Single colon between the two halves, one of the forms
 * PostgreSQL's `macaddr` type accepts.
 *
 * @example '001122:aabbcc'
 */
export function formatPgsql(octets: Uint8Array) {
  return splitHalves(octets).join(':');
}

/**
 * @example '001122-aabbcc'
 */
export function formatSingleDash(octets: Uint8Array) {
  return splitHalves(octets).join('-');
}

/**
 * Dash delimited octets without zero padding.
 *
 * @example '0-11-22-aa-bb-cc'
 */
export function formatSun(octets: Uint8Array) {
  return hexOctets(octets, 1).join('-');
}

/**
 * Dash delimited octets with the bits of each octet reversed.
 *
 * @example '00-88-44-55-dd-33' // for 00:11:22:aa:bb:cc
 */
export function formatTokenRing(octets: Uint8Array) {
  return Array.from(octets, (byte) =>
    toHex(BIT_REVERSAL_TABLE[byte] ?? 0)
  ).join('-');
}

/**
 * Organizationally Unique Identifier: the first 3 octets,
 * upper case and dash delimited.
 *
 * @example '00-11-22'
 */
export function formatOui(octets: Uint8Array) {
  return formatIeee(octets.subarray(0, 3)).toUpperCase();
}

/**
 * Spanning tree bridge ID: priority, `#`, then the Cisco form.
 *
 * @example '45#0011.22aa.bbcc'
 */
export function formatBridgeId(octets: Uint8Array, priority: number) {
  return `${priority}#${formatCisco(octets)}`;
}

/**
 * Modified EUI-64 interface identifier used by IPv6 stateless
 * autoconfiguration (RFC 4291 appendix A).
 *
 * EUI-48 input is encapsulated into EUI-64 first, then the
 * universal/local bit is inverted. The input is not modified.
 *
 * @example '0211:22ff:feaa:bbcc' // for 00:11:22:aa:bb:cc
 */
export function formatIPv6Suffix(octets: Uint8Array) {
  const eui64 = isEui48(octets) ? eui48ToEui64(octets) : octets;
  const suffix = eui64.map((byte, i) =>
    i === 0 ? byte ^ 0x02 : byte
  );

  return chunk(formatBasic(suffix), 4).join(':');
}
