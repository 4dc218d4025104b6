/**
 * Base class for every failure raised by this package
 */
export class BlynkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Config file missing, unparseable or breaking a device invariant
 */
export class ConfigError extends BlynkError {}

export class UnknownDeviceError extends BlynkError {
  constructor(public readonly device: string) {
    super(`Unknown device: ${device}`);
  }
}

/**
 * Non-2xx answer from the Blynk server
 */
export class BlynkHttpError extends BlynkError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP ${status}: ${body}`);
  }
}

/**
 * Read response that is not a JSON array starting with a number
 */
export class InvalidPayloadError extends BlynkError {
  constructor(
    public readonly device: string,
    public readonly body: string,
  ) {
    super(`Invalid payload for ${device}: ${body}`);
  }
}

export class InvalidActionError extends BlynkError {
  constructor(public readonly action: string) {
    super(`Invalid action: '${action}' is neither a known action nor a number`);
  }
}

/**
 * Current value cannot be flipped because it is not a whole number
 */
export class InvalidStateError extends BlynkError {
  constructor(
    public readonly device: string,
    public readonly state: number,
  ) {
    super(`Cannot flip ${device}: current state ${state} is not a whole number`);
  }
}
