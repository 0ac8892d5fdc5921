// Intentionally not using enum to avoid need for a transpiler
export const MacAddressErrorCode = {
  EMPTY_INPUT: 'EMPTY_INPUT',
  INVALID_FORMAT: 'INVALID_FORMAT',
  CONFLICTING_PRIORITY: 'CONFLICTING_PRIORITY',
  NOT_DERIVED_FROM_EUI48: 'NOT_DERIVED_FROM_EUI48',
  ALREADY_EUI64: 'ALREADY_EUI64',
  WRONG_ARGUMENT_TYPE: 'WRONG_ARGUMENT_TYPE',
} as const;

export type MacAddressErrorCode =
  (typeof MacAddressErrorCode)[keyof typeof MacAddressErrorCode];

/**
 * Error raised for any input or conversion that cannot produce
 * a valid hardware address.
 *
 * Every failure is a deterministic function of its input, so
 * retrying with the same value fails the same way.
 */
export class MacAddressError extends Error {
  readonly code: MacAddressErrorCode;

  constructor(code: MacAddressErrorCode, message: string) {
    super(message);
    this.name = 'MacAddressError';
    this.code = code;
  }
}

export function emptyInputError() {
  return new MacAddressError(
    MacAddressErrorCode.EMPTY_INPUT,
    'Please provide a mac address'
  );
}

export function invalidFormatError(text: string) {
  return new MacAddressError(
    MacAddressErrorCode.INVALID_FORMAT,
    `Invalid MAC format '${text}'`
  );
}

export function invalidPriorityError(priority: number | string) {
  return new MacAddressError(
    MacAddressErrorCode.INVALID_FORMAT,
    `Invalid priority '${priority}'`
  );
}

export function conflictingPriorityError(original: string, priority: number) {
  return new MacAddressError(
    MacAddressErrorCode.CONFLICTING_PRIORITY,
    `Conflicting priority in '${original}' and priority argument ${priority}`
  );
}

export function notDerivedFromEui48Error() {
  return new MacAddressError(
    MacAddressErrorCode.NOT_DERIVED_FROM_EUI48,
    'eui-64 address is not derived from an eui-48 address'
  );
}

export function alreadyEui64Error() {
  return new MacAddressError(
    MacAddressErrorCode.ALREADY_EUI64,
    'address is already eui-64'
  );
}

export function wrongArgumentTypeError(method?: string) {
  return new MacAddressError(
    MacAddressErrorCode.WRONG_ARGUMENT_TYPE,
    method ? `please use ${method}` : 'argument must be a string'
  );
}
