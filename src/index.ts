/**
 * Library entry point
 *
 * The `blynk` command lives in main.ts; everything it is built from is
 * exported here for use from other scripts.
 */
export { ActionDispatcher, parseAction } from './actions';
export type { Action } from './actions';
export { BlynkApi } from './blynkApi';
export { loadConfig, parseConfig, resolveConfigPath } from './config';
export type { BlynkConfig, DeviceConfig } from './config';
export { resolveDevices } from './deviceResolver';
export * from './errors';
export { formatStatus, formatTable } from './format';
export type { StatusResult } from './format';
export { httpGet } from './httpClient';
export type { HttpGet, HttpResponse } from './httpClient';
export { processPin } from './pinValue';
