import type { Action } from './actions';
import type { BlynkConfig } from './config';
import { ALL_SELECTORS } from './settings';

/**
 * Print and status may touch excluded devices (sensors), everything else may not
 */
export function isReadAction(action: Action): boolean {
  return action.kind === 'print' || action.kind === 'status';
}

/**
 * Expand the selector tokens into device names.
 *
 * Only the first token decides the mode: `all`/`a` selects every device, a
 * group name selects that group (both skip excluded devices unless reading),
 * anything else is taken as a literal list of device names.
 */
export function resolveDevices(
  config: BlynkConfig,
  action: Action,
  selectors: readonly string[],
): string[] {
  if (selectors.length === 0) {
    return [];
  }

  const [first] = selectors;
  const includeExcluded = isReadAction(action);
  const eligible = (name: string) => includeExcluded || !config.exclude.has(name);

  if (ALL_SELECTORS.includes(first)) {
    return [...config.devices.keys()].filter(eligible);
  }

  if (config.groups.includes(first)) {
    return [...config.devices.entries()]
      .filter(([name, device]) => device.group === first && eligible(name))
      .map(([name]) => name);
  }

  return [...selectors];
}
