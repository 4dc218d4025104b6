/**
 * Name of the installed command
 */
export const BIN_NAME = 'blynk';

/**
 * Blynk cloud server. Point `server` at your own instance if you host one.
 */
export const DEFAULT_SERVER = 'http://blynk-cloud.com';

/**
 * Config file looked up in the working directory when no path is given
 */
export const DEFAULT_CONFIG_FILE = 'blynk.config.json';

/**
 * Selector tokens that address every configured device
 */
export const ALL_SELECTORS: readonly string[] = ['all', 'a'];

export const ENV = {
  config: 'BLYNK_CONFIG',
  server: 'BLYNK_SERVER',
  debug: 'BLYNK_DEBUG',
} as const;

export const VERSION = '1.0.0';
