import type { Logger } from 'pino';
import { type BlynkConfig, type DeviceConfig, isExcluded } from './config';
import { BlynkHttpError, InvalidPayloadError, UnknownDeviceError } from './errors';
import { type HttpGet, httpGet } from './httpClient';
import { processPin } from './pinValue';

/**
 * Blynk HTTP API client
 *
 * Reads and writes one device pin per request through the
 * `/{auth}/get/{pin}` and `/{auth}/update/{pin}` endpoints.
 */
export class BlynkApi {
  constructor(
    private readonly config: BlynkConfig,
    private readonly log: Logger,
    private readonly request: HttpGet = httpGet,
  ) {}

  /**
   * Set a device to a logical value
   */
  async setState(deviceName: string, value: number): Promise<void> {
    const device = this.getDevice(deviceName);
    const pinValue = processPin(value, device.default ?? 0);

    const url = `${this.config.server}/${device.auth}/update/${device.pin}?value=${pinValue}`;

    this.log.debug(`GET update ${deviceName} (${device.pin}) value=${pinValue}`);
    await this.makeRequest(url);
    this.log.info(`Set ${deviceName} to ${value}`);
  }

  /**
   * Get the logical value of a device
   *
   * Only 0/1 readings of switchable devices are inverted; sensor values and
   * anything else come back as the server reports them.
   */
  async getState(deviceName: string): Promise<number> {
    const device = this.getDevice(deviceName);
    const url = `${this.config.server}/${device.auth}/get/${device.pin}`;

    this.log.debug(`GET get ${deviceName} (${device.pin})`);
    const data = await this.makeRequest(url);

    const state = processPin(this.parseValue(deviceName, data));

    if ((state !== 0 && state !== 1) || isExcluded(this.config, deviceName)) {
      return state;
    }
    return processPin(state, device.default ?? 0);
  }

  private getDevice(deviceName: string): Readonly<DeviceConfig> {
    const device = this.config.devices.get(deviceName);
    if (!device) {
      throw new UnknownDeviceError(deviceName);
    }
    return device;
  }

  /**
   * First element of the JSON array answer, e.g. `["1"]` or `[23.5]`
   */
  private parseValue(deviceName: string, data: string): number {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      throw new InvalidPayloadError(deviceName, data);
    }

    if (!Array.isArray(payload) || payload.length === 0) {
      throw new InvalidPayloadError(deviceName, data);
    }

    const first: unknown = payload[0];
    const value = typeof first === 'number'
      ? first
      : typeof first === 'string' && first.trim() !== '' ? Number(first) : NaN;

    if (Number.isNaN(value)) {
      throw new InvalidPayloadError(deviceName, data);
    }
    return value;
  }

  private async makeRequest(url: string): Promise<string> {
    const response = await this.request(url);

    if (response.status < 200 || response.status >= 300) {
      throw new BlynkHttpError(response.status, response.data);
    }
    return response.data;
  }
}
