/**
 * Result of a status read: a bare value for one device, a map otherwise
 */
export type StatusResult =
  | { kind: 'single'; device: string; value: number }
  | { kind: 'multiple'; states: ReadonlyMap<string, number> };

/**
 * Render device states as an aligned table
 *
 * ```
 * bedroom_light : 1
 * temperature   : 23.5
 * ```
 */
export function formatTable(states: ReadonlyMap<string, number>): string {
  if (states.size === 0) {
    return '';
  }

  const width = Math.max(...[...states.keys()].map(name => name.length)) + 1;
  const rows: string[] = [];

  for (const [device, state] of states) {
    rows.push(`${device.padEnd(width)}: ${String(state).padEnd(3)} `);
  }

  return rows.join('\n');
}

export function formatStatus(result: StatusResult): string {
  if (result.kind === 'single') {
    return String(result.value);
  }
  return JSON.stringify(Object.fromEntries(result.states));
}
