/**
 * Map a pin value to or from its logical value.
 *
 * Whole numbers are XORed with the device's default state, so a device wired
 * active-low (default 1) reads 0 when it is on. Fractional values are passed
 * through untouched. Applying it twice with the same default gives back the
 * original whole number.
 */
export function processPin(value: number, defaultState: number = 0): number {
  if (Number.isInteger(value)) {
    // BigInt keeps values beyond 32 bits intact
    return Number(BigInt(value) ^ BigInt(defaultState));
  }
  return value;
}
