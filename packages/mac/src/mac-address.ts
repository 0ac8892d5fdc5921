import { getConfig } from './config.js';
import { MacAddressError } from './errors.js';
import { eui48ToEui64, eui64ToEui48 } from './eui.js';
import {
  formatBasic,
  formatBpr,
  formatBridgeId,
  formatCisco,
  formatIeee,
  formatIPv6Suffix,
  formatMicrosoft,
  formatOui,
  formatPgsql,
  formatSingleDash,
  formatSun,
  formatTokenRing,
} from './format.js';
import { parseMacAddress } from './parser.js';
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

export type MacAddressOptions = {
  /**
   * Bridge priority, used by `asBridgeId()`.
   *
   * Can also be given as a `<priority>#` prefix of the address text,
   * in which case both must agree.
   *
   * @default 0
   */
  priority?: number;

  /**
   * Throw on failure instead of returning a failure result.
   *
   * Defaults to the process-wide `strictErrors` setting.
   */
  strictErrors?: boolean;
};

export type MacAddressResult =
  | { success: true; address: MacAddress }
  | { success: false; error: MacAddressError };

export type ParseResult = MacAddressResult;
export type ConversionResult = MacAddressResult;

/**
 * An immutable EUI-48 or EUI-64 hardware address.
 *
 * @example
 * const mac = MacAddress.parse('0011.22AA.BBCC');
 * mac.asMicrosoft(); // '00:11:22:aa:bb:cc'
 * mac.isUnicast(); // true
 */
export class MacAddress {
  #octets: Uint8Array;
  #priority: number;
  #original: string;
  #strictErrors: boolean;

  private constructor(
    octets: Uint8Array,
    priority: number,
    original: string,
    strictErrors: boolean
  ) {
    this.#octets = octets;
    this.#priority = priority;
    this.#original = original;
    this.#strictErrors = strictErrors;
  }

  /**
   * Parses an address from text.
   *
   * Throws a `MacAddressError` if the text is not a valid address.
   */
  static parse(text: string, options: MacAddressOptions = {}) {
    const { octets, priority } = parseMacAddress(text, options);

    return new MacAddress(
      octets,
      priority,
      text,
      options.strictErrors ?? getConfig().strictErrors
    );
  }

  /**
   * Parses an address from text, returning the failure
   * instead of throwing.
   */
  static safeParse(text: string, options: MacAddressOptions = {}): ParseResult {
    return attempt(() => MacAddress.parse(text, options));
  }

  /**
   * Copy of the address octets in transmission order.
   */
  get octets() {
    return this.#octets.slice();
  }

  get priority() {
    return this.#priority;
  }

  /**
   * The text this address was parsed from, verbatim.
   */
  get original() {
    return this.#original;
  }

  get strictErrors() {
    return this.#strictErrors;
  }

  isEui48() {
    return isEui48(this.#octets);
  }

  isEui64() {
    return isEui64(this.#octets);
  }

  isUnicast() {
    return isUnicast(this.#octets);
  }

  isMulticast() {
    return isMulticast(this.#octets);
  }

  isBroadcast() {
    return isBroadcast(this.#octets);
  }

  isLocal() {
    return isLocal(this.#octets);
  }

  isUniversal() {
    return isUniversal(this.#octets);
  }

  isVrrp() {
    return isVrrp(this.#octets);
  }

  isHsrp() {
    return isHsrp(this.#octets);
  }

  isHsrp2() {
    return isHsrp2(this.#octets);
  }

  oui() {
    return formatOui(this.#octets);
  }

  asBasic() {
    return formatBasic(this.#octets);
  }

  asBpr() {
    return formatBpr(this.#octets);
  }

  asBridgeId() {
    return formatBridgeId(this.#octets, this.#priority);
  }

  asCisco() {
    return formatCisco(this.#octets);
  }

  asIeee() {
    return formatIeee(this.#octets);
  }

  asIPv6Suffix() {
    return formatIPv6Suffix(this.#octets);
  }

  asMicrosoft() {
    return formatMicrosoft(this.#octets);
  }

  asPgsql() {
    return formatPgsql(this.#octets);
  }

  asSingleDash() {
    return formatSingleDash(this.#octets);
  }

  asSun() {
    return formatSun(this.#octets);
  }

  asTokenRing() {
    return formatTokenRing(this.#octets);
  }

  /**
   * Encapsulates an EUI-48 into a new EUI-64 address.
   *
   * Fails if the address is already EUI-64.
   */
  toEui64(): ConversionResult {
    return this.#convert(eui48ToEui64);
  }

  /**
   * Recovers the EUI-48 from an EUI-64 that was derived from one.
   * An EUI-48 converts to an equal copy of itself.
   *
   * Fails if the EUI-64 has no encapsulated EUI-48.
   */
  toEui48(): ConversionResult {
    return this.#convert(eui64ToEui48);
  }

  equals(other: MacAddress) {
    return this.asBasic() === other.asBasic();
  }

  toString() {
    return this.asMicrosoft();
  }

  #convert(
    conversion: (octets: Uint8Array) => Uint8Array
  ): ConversionResult {
    const convert = () =>
      new MacAddress(
        conversion(this.#octets),
        this.#priority,
        this.#original,
        this.#strictErrors
      );

    if (this.#strictErrors) {
      return { success: true, address: convert() };
    }

    return attempt(convert);
  }
}

/**
 * Parses an address, honouring the process-wide `strictErrors`
 * setting unless overridden in `options`.
 *
 * In strict mode failures are thrown, so the result is always a success.
 */
export function createMacAddress(
  text: string,
  options: MacAddressOptions = {}
): ParseResult {
  const strictErrors = options.strictErrors ?? getConfig().strictErrors;
  const parse = () => MacAddress.parse(text, { ...options, strictErrors });

  if (strictErrors) {
    return { success: true, address: parse() };
  }

  return attempt(parse);
}

function attempt(create: () => MacAddress): MacAddressResult {
  try {
    return { success: true, address: create() };
  } catch (err) {
    if (err instanceof MacAddressError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
