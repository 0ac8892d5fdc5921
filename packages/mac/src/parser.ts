import {
  EUI48_HEX_LENGTH,
  EUI48_LENGTH,
  EUI64_HEX_LENGTH,
  EUI64_LENGTH,
} from './constants.js';
import {
  conflictingPriorityError,
  emptyInputError,
  invalidFormatError,
  invalidPriorityError,
} from './errors.js';
import { chunk, parseHex } from './util.js';

// Cisco bridge ID, e.g. `60#0011.22aa.bbcc`
const PRIORITY_PREFIX = /^(\d+)#(.+)$/;

// Cisco BPR, e.g. `1,6,00:11:22:aa:bb:cc`. The length is not verified.
const BPR_PREFIX = /^1,\d+,/;

const GROUP_DELIMITER = /[^a-z0-9]+/i;
const NON_HEX = /[^a-f0-9]/i;

export type ParseMacAddressOptions = {
  /**
   * Bridge priority supplied alongside the text, an unsigned integer.
   * Must match a `<priority>#` prefix in the text, if there is one.
   */
  priority?: number;
};

export type ParsedMacAddress = {
  octets: Uint8Array;
  priority: number;
};

/**
 * Parses a hardware address in any of the common textual forms
 * into its EUI-48 (6 byte) or EUI-64 (8 byte) octets.
 *
 * Accepts any non-alphanumeric delimiter, upper or lower case,
 * and an optional `<priority>#` or `1,<length>,` prefix.
 *
 * @example
 * parseMacAddress('00:11:22:aa:bb:cc');
 * parseMacAddress('0011.22AA.BBCC');
 * parseMacAddress('60#00-11-22-aa-bb-cc'); // priority 60
 *
 * Throws a `MacAddressError` if the text is not a valid address.
 */
export function parseMacAddress(
  text: string,
  options: ParseMacAddressOptions = {}
): ParsedMacAddress {
  const trimmed = text ? text.trim() : '';

  if (!trimmed) {
    throw emptyInputError();
  }

  if (options.priority !== undefined && !isPriority(options.priority)) {
    throw invalidPriorityError(options.priority);
  }

  let body = trimmed;
  let priority = options.priority ?? 0;

  const priorityMatch = PRIORITY_PREFIX.exec(trimmed);

  if (priorityMatch) {
    const [, digits = '', rest = ''] = priorityMatch;
    const embeddedPriority = Number(digits);

    if (!isPriority(embeddedPriority)) {
      throw invalidPriorityError(digits);
    }

    if (
      options.priority !== undefined &&
      options.priority !== embeddedPriority
    ) {
      throw conflictingPriorityError(text, options.priority);
    }

    priority = embeddedPriority;
    body = rest;
  }

  const groups = splitGroups(body.replace(BPR_PREFIX, ''));

  if (groups.some((group) => NON_HEX.test(group))) {
    throw invalidFormatError(trimmed);
  }

  const octets = resolveOctets(groups);

  if (!octets) {
    throw invalidFormatError(trimmed);
  }

  return { octets, priority };
}

function isPriority(value: number) {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Splits on runs of non-alphanumeric characters, then breaks every
 * even length group into hex pairs. Odd length groups are kept whole.
 *
 * `aabb.cc.00.11.22` and `11.22.33.aabbcc` both become 6 pairs.
 */
export function splitGroups(text: string): string[] {
  return text
    .split(GROUP_DELIMITER)
    .filter((group) => group.length > 0)
    .flatMap((group) => (group.length % 2 === 0 ? chunk(group, 2) : [group]));
}

/**
 * Maps hex groups to octets, or returns `undefined` if
 * they don't form an EUI-48 or EUI-64.
 */
function resolveOctets(groups: string[]): Uint8Array | undefined {
  const [first] = groups;

  // Single concatenated blob, e.g. `001122aabbcc`
  if (
    groups.length === 1 &&
    first !== undefined &&
    (first.length === EUI48_HEX_LENGTH || first.length === EUI64_HEX_LENGTH)
  ) {
    return toOctets(chunk(first, 2));
  }

  // One group per octet, e.g. `00:11:22:aa:bb:cc` or `0-11-22-aa-bb-cc`
  if (groups.length === EUI48_LENGTH || groups.length === EUI64_LENGTH) {
    if (groups.some((group) => group.length > 2)) {
      return undefined;
    }
    return toOctets(groups);
  }

  // One group per 2 octets, e.g. `0011.22aa.bbcc`. Leading zeros
  // may not be dropped, so truncated input is still detected.
  if (
    groups.length === EUI48_LENGTH / 2 ||
    groups.length === EUI64_LENGTH / 2
  ) {
    if (groups.some((group) => group.length !== 4)) {
      return undefined;
    }
    return toOctets(groups.flatMap((group) => chunk(group, 2)));
  }

  return undefined;
}

function toOctets(pairs: string[]): Uint8Array | undefined {
  const values = pairs.map((pair) => parseHex(pair));

  if (values.some((value) => !Number.isInteger(value) || value > 0xff)) {
    return undefined;
  }

  return new Uint8Array(values);
}
