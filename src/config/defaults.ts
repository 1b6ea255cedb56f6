/**
 * Default configuration values for the renterd client
 * @module renterd-client/config/defaults
 */

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT = 300000;

/**
 * Default connect timeout in milliseconds.
 */
export const DEFAULT_CONNECT_TIMEOUT = 10000;

/**
 * Default number of pooled connections per origin.
 */
export const DEFAULT_POOL_CONNECTIONS = 10;

/**
 * Default idle keep-alive timeout in milliseconds.
 */
export const DEFAULT_KEEP_ALIVE_TIMEOUT = 90000;

/**
 * Default bytes buffered per object stream (64 KiB).
 */
export const DEFAULT_HIGH_WATER_MARK = 64 * 1024;
