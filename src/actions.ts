import type { Logger } from 'pino';
import type { BlynkApi } from './blynkApi';
import type { BlynkConfig } from './config';
import { InvalidActionError, InvalidStateError } from './errors';
import { type StatusResult, formatStatus, formatTable } from './format';
import { processPin } from './pinValue';

// Decimal float literal, digits may be grouped with underscores
const FLOAT_LITERAL = /^[+-]?(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse a float literal such as `0.5`, `-1`, `1e3`, `1_000` or `inf`
 */
export function parseFloatLiteral(token: string): number | undefined {
  const text = token.trim();

  const special = SPECIAL_FLOAT.exec(text);
  if (special) {
    if (special[2].toLowerCase() === 'nan') {
      return NaN;
    }
    return special[1] === '-' ? -Infinity : Infinity;
  }

  if (!FLOAT_LITERAL.test(text)) {
    return undefined;
  }
  return Number(text.replace(/_/g, ''));
}

export type Action =
  | { kind: 'on' }
  | { kind: 'off' }
  | { kind: 'flip' }
  | { kind: 'just' }
  | { kind: 'print' }
  | { kind: 'status' }
  | { kind: 'set'; value: number };

/**
 * Parse the action token. Prefixes are checked in a fixed order; `on` must
 * match exactly, anything unmatched has to be a number.
 */
export function parseAction(token: string): Action {
  if (token.startsWith('f')) {
    return { kind: 'flip' };
  }
  if (token.startsWith('of')) {
    return { kind: 'off' };
  }
  if (token === 'on') {
    return { kind: 'on' };
  }
  if (token.startsWith('j')) {
    return { kind: 'just' };
  }
  if (token.startsWith('p')) {
    return { kind: 'print' };
  }
  if (token.startsWith('s')) {
    return { kind: 'status' };
  }

  const value = parseFloatLiteral(token);
  if (value === undefined) {
    throw new InvalidActionError(token);
  }
  return { kind: 'set', value };
}

/**
 * Applies an action to resolved devices, one request at a time
 */
export class ActionDispatcher {
  constructor(
    private readonly config: BlynkConfig,
    private readonly api: BlynkApi,
    private readonly log: Logger,
  ) {}

  /**
   * Run the action and return what should be printed, if anything
   */
  async run(action: Action, devices: readonly string[]): Promise<string | undefined> {
    this.log.debug(`Running ${action.kind} on [${devices.join(', ')}]`);

    switch (action.kind) {
      case 'on':
        await this.setAll(devices, 1);
        return undefined;
      case 'off':
        await this.setAll(devices, 0);
        return undefined;
      case 'flip':
        await this.flip(devices);
        return undefined;
      case 'just':
        await this.just(devices);
        return undefined;
      case 'print':
        return formatTable(await this.getStates(devices));
      case 'status':
        return formatStatus(await this.getStatus(devices));
      case 'set':
        await this.setAll(devices, action.value);
        return undefined;
    }
  }

  async setAll(devices: readonly string[], value: number): Promise<void> {
    for (const device of devices) {
      await this.api.setState(device, value);
    }
  }

  /**
   * Toggle each device from its current reading
   */
  async flip(devices: readonly string[]): Promise<void> {
    for (const device of devices) {
      const state = await this.api.getState(device);
      if (!Number.isInteger(state)) {
        throw new InvalidStateError(device, state);
      }
      await this.api.setState(device, processPin(state, 1));
    }
  }

  /**
   * Turn the given devices on and every other switchable device sharing a
   * group with any of them off
   */
  async just(devices: readonly string[]): Promise<void> {
    await this.setAll(devices, 1);

    const groups = new Set<string>();
    for (const name of devices) {
      const group = this.config.devices.get(name)?.group;
      if (group !== undefined) {
        groups.add(group);
      }
    }

    const turnOff = [...this.config.devices.entries()]
      .filter(([name, device]) =>
        !this.config.exclude.has(name) &&
        device.group !== undefined &&
        groups.has(device.group) &&
        !devices.includes(name))
      .map(([name]) => name);

    await this.setAll(turnOff, 0);
  }

  /**
   * Read every device; a repeated name keeps its first position
   */
  async getStates(devices: readonly string[]): Promise<Map<string, number>> {
    const states = new Map<string, number>();
    for (const device of devices) {
      states.set(device, await this.api.getState(device));
    }
    return states;
  }

  async getStatus(devices: readonly string[]): Promise<StatusResult> {
    if (devices.length === 1) {
      const [device] = devices;
      return { kind: 'single', device, value: await this.api.getState(device) };
    }
    return { kind: 'multiple', states: await this.getStates(devices) };
  }
}
