import { getConfig } from './config.js';
import { MacAddressError, wrongArgumentTypeError } from './errors.js';
import { MacAddress } from './mac-address.js';

let lastError: MacAddressError | undefined;

/**
 * The error from the most recent `mac*` function call,
 * or `undefined` if it succeeded.
 *
 * Shared by the whole process, not per caller.
 */
export function getLastError() {
  return lastError;
}

/**
 * Parses `text` and applies `operation` to the address.
 *
 * Failures are thrown when strict errors are configured, otherwise
 * they are recorded for `getLastError()` and `undefined` is returned.
 *
 * Internal use only.
 */
export function withParsedText<T>(
  method: string,
  text: unknown,
  operation: (address: MacAddress) => T
): T | undefined {
  const { strictErrors, debug } = getConfig();
  lastError = undefined;

  try {
    if (text instanceof MacAddress) {
      throw wrongArgumentTypeError(method);
    }

    if (typeof text !== 'string') {
      throw wrongArgumentTypeError();
    }

    return operation(MacAddress.parse(text, { strictErrors }));
  } catch (err) {
    if (strictErrors || !(err instanceof MacAddressError)) {
      throw err;
    }

    lastError = err;

    if (debug) {
      console.debug('mac address error:', err.message);
    }

    return undefined;
  }
}

export function macIsEui48(mac: string) {
  return withParsedText('isEui48', mac, (address) => address.isEui48());
}

export function macIsEui64(mac: string) {
  return withParsedText('isEui64', mac, (address) => address.isEui64());
}

export function macIsUnicast(mac: string) {
  return withParsedText('isUnicast', mac, (address) => address.isUnicast());
}

export function macIsMulticast(mac: string) {
  return withParsedText('isMulticast', mac, (address) =>
    address.isMulticast()
  );
}

export function macIsBroadcast(mac: string) {
  return withParsedText('isBroadcast', mac, (address) =>
    address.isBroadcast()
  );
}

export function macIsVrrp(mac: string) {
  return withParsedText('isVrrp', mac, (address) => address.isVrrp());
}

export function macIsHsrp(mac: string) {
  return withParsedText('isHsrp', mac, (address) => address.isHsrp());
}

export function macIsHsrp2(mac: string) {
  return withParsedText('isHsrp2', mac, (address) => address.isHsrp2());
}

export function macIsLocal(mac: string) {
  return withParsedText('isLocal', mac, (address) => address.isLocal());
}

export function macIsUniversal(mac: string) {
  return withParsedText('isUniversal', mac, (address) =>
    address.isUniversal()
  );
}

export function macAsBasic(mac: string) {
  return withParsedText('asBasic', mac, (address) => address.asBasic());
}

export function macAsBpr(mac: string) {
  return withParsedText('asBpr', mac, (address) => address.asBpr());
}

export function macAsBridgeId(mac: string) {
  return withParsedText('asBridgeId', mac, (address) => address.asBridgeId());
}

export function macAsCisco(mac: string) {
  return withParsedText('asCisco', mac, (address) => address.asCisco());
}

export function macAsIeee(mac: string) {
  return withParsedText('asIeee', mac, (address) => address.asIeee());
}

export function macAsIPv6Suffix(mac: string) {
  return withParsedText('asIPv6Suffix', mac, (address) =>
    address.asIPv6Suffix()
  );
}

export function macAsMicrosoft(mac: string) {
  return withParsedText('asMicrosoft', mac, (address) =>
    address.asMicrosoft()
  );
}

export function macAsOui(mac: string) {
  return withParsedText('oui', mac, (address) => address.oui());
}

export function macAsPgsql(mac: string) {
  return withParsedText('asPgsql', mac, (address) => address.asPgsql());
}

export function macAsSingleDash(mac: string) {
  return withParsedText('asSingleDash', mac, (address) =>
    address.asSingleDash()
  );
}

export function macAsSun(mac: string) {
  return withParsedText('asSun', mac, (address) => address.asSun());
}

export function macAsTokenRing(mac: string) {
  return withParsedText('asTokenRing', mac, (address) =>
    address.asTokenRing()
  );
}
