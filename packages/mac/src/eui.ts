import { EUI64_FILLER } from './constants.js';
import { alreadyEui64Error, notDerivedFromEui48Error } from './errors.js';
import { isEui48, isEui64 } from './properties.js';

/**
 * Encapsulates an EUI-48 into an EUI-64 by inserting `ff:fe`
 * between the OUI and the device identifier.
 *
 * Throws if the address is already EUI-64.
 */
export function eui48ToEui64(octets: Uint8Array) {
  if (!isEui48(octets)) {
    throw alreadyEui64Error();
  }

  return new Uint8Array([
    ...octets.subarray(0, 3),
    ...EUI64_FILLER,
    ...octets.subarray(3),
  ]);
}

/**
 * Whether an EUI-64 carries an encapsulated EUI-48
 * (`ff:fe`, or the older `ff:ff`, in the fourth and fifth octets).
 */
export function isDerivedFromEui48(octets: Uint8Array) {
  const [, , , fourth, fifth] = octets;

  return (
    isEui64(octets) && fourth === 0xff && (fifth === 0xff || fifth === 0xfe)
  );
}

/**
 * Recovers the EUI-48 encapsulated in an EUI-64.
 *
 * EUI-48 input is returned as a copy.
 *
 * Throws if the EUI-64 was not derived from an EUI-48.
 */
export function eui64ToEui48(octets: Uint8Array) {
  if (isEui48(octets)) {
    return octets.slice();
  }

  if (!isDerivedFromEui48(octets)) {
    throw notDerivedFromEui48Error();
  }

  return new Uint8Array([...octets.subarray(0, 3), ...octets.subarray(5)]);
}
