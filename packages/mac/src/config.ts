export type MacAddressConfig = {
  /**
   * Throw `MacAddressError`s instead of returning failure results.
   *
   * Can be overridden per address with the `strictErrors` option.
   */
  strictErrors: boolean;

  /**
   * Log errors recorded by the procedural `mac*` functions.
   */
  debug: boolean;
};

const defaultConfig: MacAddressConfig = {
  strictErrors: false,
  debug: false,
};

let config: MacAddressConfig = { ...defaultConfig };

/**
 * Sets process-wide defaults.
 *
 * @example
 * configure({ strictErrors: true });
 */
export function configure(options: Partial<MacAddressConfig>) {
  config = {
    strictErrors: options.strictErrors ?? config.strictErrors,
    debug: options.debug ?? config.debug,
  };
}

export function getConfig(): MacAddressConfig {
  return { ...config };
}

export function resetConfig() {
  config = { ...defaultConfig };
}
