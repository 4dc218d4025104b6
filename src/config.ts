import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_CONFIG_FILE, DEFAULT_SERVER, ENV } from './settings';

const defaultStateSchema = z.union([z.literal(0), z.literal(1)]);

export const deviceSchema = z.object({
  pin: z.string().min(1),
  auth: z.string().min(1),
  default: defaultStateSchema.optional(),
  group: z.string().min(1).optional(),
});

export const configFileSchema = z.object({
  server: z.string().url().optional(),
  devices: z.record(z.string(), deviceSchema),
  exclude: z.array(z.string()).default([]),
  groups: z.array(z.string()).optional(),
});

export type DeviceConfig = z.infer<typeof deviceSchema>;
export type ConfigFile = z.input<typeof configFileSchema>;

/**
 * Resolved, read-only configuration shared by the resolver, dispatcher and API client
 */
export interface BlynkConfig {
  readonly server: string;
  readonly devices: ReadonlyMap<string, Readonly<DeviceConfig>>;
  readonly exclude: ReadonlySet<string>;
  readonly groups: readonly string[];
}

/**
 * Overrides applied on top of the file (CLI options, environment)
 */
export interface ConfigOverrides {
  server?: string;
}

/**
 * Validate raw JSON and build the immutable configuration
 */
export function parseConfig(raw: unknown, overrides: ConfigOverrides = {}): BlynkConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const file = result.data;
  const exclude = new Set(file.exclude);
  const devices = new Map<string, Readonly<DeviceConfig>>();

  for (const [name, device] of Object.entries(file.devices)) {
    // Anything that can be switched must say how it is wired
    if (!exclude.has(name) && device.default === undefined) {
      throw new ConfigError(
        `Device '${name}' needs a "default" of 0 or 1, or must be listed in "exclude"`,
      );
    }
    devices.set(name, Object.freeze({ ...device }));
  }

  const groups = file.groups ?? [
    ...new Set(
      [...devices.values()]
        .map(device => device.group)
        .filter((group): group is string => group !== undefined),
    ),
  ];

  const server = overrides.server ?? file.server ?? DEFAULT_SERVER;

  return Object.freeze({
    server: server.replace(/\/+$/, ''),
    devices,
    exclude,
    groups: Object.freeze([...groups]),
  });
}

/**
 * Pick the config file: explicit path, then $BLYNK_CONFIG, then ./blynk.config.json
 */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  return path.resolve(cwd, explicit ?? env[ENV.config] ?? DEFAULT_CONFIG_FILE);
}

/**
 * Read and validate a config file
 */
export function loadConfig(file: string, overrides: ConfigOverrides = {}): BlynkConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}: ${error}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${error}`);
  }

  return parseConfig(raw, overrides);
}

export function isExcluded(config: BlynkConfig, device: string): boolean {
  return config.exclude.has(device);
}
