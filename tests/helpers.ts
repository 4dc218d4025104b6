import pino from 'pino';
import { type ConfigFile, parseConfig } from '../src/config';
import type { HttpGet, HttpResponse } from '../src/httpClient';

export const SERVER = 'http://blynk.test';

export const testConfigFile: ConfigFile = {
  server: SERVER,
  devices: {
    bedroom_light: { pin: 'V3', auth: 'test-token', default: 0, group: 'bedroom' },
    kitchen_light: { pin: 'D2', auth: 'test-token', default: 1, group: 'kitchen' },
    kitchen_fan: { pin: 'V7', auth: 'test-token', default: 0, group: 'kitchen' },
    bedroom_lamp: { pin: 'V4', auth: 'test-token', default: 1, group: 'bedroom' },
    temperature: { pin: 'V6', auth: 'test-token', group: 'kitchen' },
    humidity: { pin: 'V5', auth: 'test-token' },
  },
  exclude: ['temperature', 'humidity'],
  groups: ['bedroom', 'kitchen'],
};

export const testConfig = parseConfig(testConfigFile);

export const silentLogger = pino({ level: 'silent' });

/**
 * In-memory stand-in for the Blynk server, keyed by pin
 */
export class FakeBlynk {
  readonly urls: string[] = [];
  readonly pins = new Map<string, string>();
  private readonly failures = new Map<string, HttpResponse>();

  constructor(initial: Record<string, string> = {}) {
    for (const [pin, value] of Object.entries(initial)) {
      this.pins.set(pin, value);
    }
  }

  /**
   * Request paths without the server, e.g. `/test-token/get/V3`
   */
  get calls(): string[] {
    return this.urls.map(url => {
      const { pathname, search } = new URL(url);
      return pathname + search;
    });
  }

  failOn(pin: string, response: HttpResponse): void {
    this.failures.set(pin, response);
  }

  readonly request: HttpGet = async (url) => {
    this.urls.push(url);
    const { pathname, searchParams } = new URL(url);
    const [, , command, pin] = pathname.split('/');

    const failure = this.failures.get(pin);
    if (failure) {
      return failure;
    }

    if (command === 'update') {
      this.pins.set(pin, searchParams.get('value') ?? '');
      return { status: 200, data: '' };
    }
    if (command === 'get') {
      const value = this.pins.get(pin);
      return value === undefined
        ? { status: 400, data: 'Requested pin doesn\'t exist in the app.' }
        : { status: 200, data: JSON.stringify([value]) };
    }
    return { status: 404, data: 'Not found' };
  };
}
