import { Command } from 'commander';
import pino, { type Logger } from 'pino';
import { ActionDispatcher, parseAction } from './actions';
import { BlynkApi } from './blynkApi';
import { type BlynkConfig, loadConfig, resolveConfigPath } from './config';
import { resolveDevices } from './deviceResolver';
import type { HttpGet } from './httpClient';
import { BIN_NAME, ENV, VERSION } from './settings';

const ACTIONS_HELP = `
Actions:
  on         Turn the device(s) on
  of(f)      Turn the device(s) off
  f(lip)     Flip the device(s)
  j(ust)     Turn the device(s) on and turn off every other device in the same group
  p(rint)    Print the status of the device(s) as a table
  s(tatus)   Print the status of the device(s) in json format
  any int/float for setting a pin to an arbitrary value

Devices:
  a(ll)      Every configured device
  <group>    Every device in a configured group
  <name...>  The named devices`;

// Errors the command has already logged, so the entry point does not repeat them
const reported = new WeakSet<object>();

export function wasReported(error: unknown): boolean {
  return typeof error === 'object' && error !== null && reported.has(error);
}

export type CliOptions = {
  config?: string;
  server?: string;
  debug?: boolean;
};

export interface CliDeps {
  /** Receives each block of command output, without trailing newline */
  out: (text: string) => void;
  createLogger?: (debug: boolean) => Logger;
  request?: HttpGet;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ExecuteContext {
  config: BlynkConfig;
  log: Logger;
  out: (text: string) => void;
  request?: HttpGet;
}

/**
 * Logger writing to stderr so stdout only carries command output
 */
export function createLogger(debug: boolean): Logger {
  return pino(
    { name: BIN_NAME, level: debug ? 'debug' : 'warn' },
    pino.destination(2),
  );
}

function isEnabled(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Run one invocation: the last token is the action, the rest select devices
 */
export async function execute(tokens: readonly string[], context: ExecuteContext): Promise<void> {
  const selectors = tokens.slice(0, -1);
  const action = parseAction(tokens[tokens.length - 1]);

  const devices = resolveDevices(context.config, action, selectors);
  const api = new BlynkApi(context.config, context.log, context.request);
  const dispatcher = new ActionDispatcher(context.config, api, context.log);

  const output = await dispatcher.run(action, devices);
  if (output !== undefined) {
    context.out(output);
  }
}

export function buildProgram(deps: CliDeps): Command {
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .name(BIN_NAME)
    .description('Read and set the state of Blynk devices')
    .version(VERSION)
    .usage('[options] [DEVICE(S)] [ACTION]')
    .argument('[tokens...]', 'devices or groups, followed by an action')
    .option('-c, --config <path>', `config file (default: $${ENV.config} or ./blynk.config.json)`)
    .option('-s, --server <url>', `Blynk server URL (default: $${ENV.server} or the config file)`)
    .option('-d, --debug', 'log every request to stderr')
    // Negative set values such as -1 are tokens, not options
    .allowUnknownOption()
    .addHelpText('after', ACTIONS_HELP)
    .action(async (tokens: string[] | undefined) => {
      const args = tokens ?? [];
      if (args.length < 2) {
        program.outputHelp();
        return;
      }

      const options = program.opts<CliOptions>();
      const debug = Boolean(options.debug) || isEnabled(env[ENV.debug]);
      const log = (deps.createLogger ?? createLogger)(debug);

      try {
        const config = loadConfig(
          resolveConfigPath(options.config, env, deps.cwd),
          { server: options.server ?? env[ENV.server] },
        );
        log.debug(`Using server ${config.server}`);

        await execute(args, { config, log, out: deps.out, request: deps.request });
      } catch (error) {
        log.error({ err: error }, 'Command failed');
        if (typeof error === 'object' && error !== null) {
          reported.add(error);
        }
        throw error;
      }
    });

  return program;
}
