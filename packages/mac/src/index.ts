export * from './mac-address.js';
export {
  getLastError,
  macAsBasic,
  macAsBpr,
  macAsBridgeId,
  macAsCisco,
  macAsIeee,
  macAsIPv6Suffix,
  macAsMicrosoft,
  macAsOui,
  macAsPgsql,
  macAsSingleDash,
  macAsSun,
  macAsTokenRing,
  macIsBroadcast,
  macIsEui48,
  macIsEui64,
  macIsHsrp,
  macIsHsrp2,
  macIsLocal,
  macIsMulticast,
  macIsUnicast,
  macIsUniversal,
  macIsVrrp,
} from './functions.js';
export { configure, getConfig, resetConfig } from './config.js';
export type { MacAddressConfig } from './config.js';
export { MacAddressError, MacAddressErrorCode } from './errors.js';
export { eui48ToEui64, eui64ToEui48, isDerivedFromEui48 } from './eui.js';
export {
  parseMacAddress,
  type ParseMacAddressOptions,
  type ParsedMacAddress,
} from './parser.js';
