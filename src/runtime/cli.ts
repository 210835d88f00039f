import { parseArgs } from 'node:util';
import { parseLogLevel } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { readOptionalSeconds, type EnvironmentConfig } from '@/config/environment';
import { UsageError } from '@/domain/errors';
import type { DaemonArgs } from '@/domain/session/types';

export type ServiceAction = 'start' | 'stop' | 'status' | 'restart';

export type CliCommand =
  | { kind: 'connect'; args: DaemonArgs }
  | { kind: 'service'; action: ServiceAction; args: DaemonArgs }
  | { kind: 'help' };

const SERVICE_ACTIONS: readonly ServiceAction[] = ['start', 'stop', 'status', 'restart'];

export const USAGE = `Usage:
  cast-bridge connect [options]          run in the foreground
  cast-bridge service <action> [options] start|stop|status|restart a background session

Options:
  -n, --name <name>        friendly name of the Cast device
  -h, --host <host>        hostname or IP address of the Cast device
  -u, --uuid <uuid>        UUID of the Cast device
  -w, --wait <seconds>     seconds between discovery attempts ("none" disables retrying)
      --no-wait            try once and exit when no device is found
  -r, --retry-wait <sec>   seconds between connection attempts
  -i, --icon               use the light icon
  -l, --log-level <level>  spam|debug|info|warn|error|none
      --help               show this message`;

const OPTIONS = {
  name: { type: 'string', short: 'n' },
  host: { type: 'string', short: 'h' },
  uuid: { type: 'string', short: 'u' },
  wait: { type: 'string', short: 'w' },
  'no-wait': { type: 'boolean' },
  'retry-wait': { type: 'string', short: 'r' },
  icon: { type: 'boolean', short: 'i' },
  'log-level': { type: 'string', short: 'l' },
  help: { type: 'boolean' },
} as const;

type Defaults = Pick<EnvironmentConfig, 'wait' | 'retryWait' | 'logLevel'>;

function seconds(flag: string, raw: string | undefined, fallback: number | null): number | null {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  const disabled = normalized === 'none' || normalized === 'off' || normalized === '-1';
  if (!disabled && !/^\d+(\.\d+)?$/.test(normalized)) {
    throw new UsageError(`--${flag} expects a number of seconds, got "${raw}"`);
  }
  return readOptionalSeconds(raw, fallback);
}

const nonEmpty = (value: string | undefined): string | null =>
  value !== undefined && value.trim().length > 0 ? value.trim() : null;

function readArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

/**
 * Turns argv (without the node binary and script) into a command.
 */
export function parseCli(argv: string[], defaults: Defaults): CliCommand {
  const { values, positionals } = readArgv(argv);

  if (values.help) {
    return { kind: 'help' };
  }
  if (values['no-wait'] && values.wait !== undefined) {
    throw new UsageError('--wait and --no-wait are mutually exclusive');
  }

  const args: DaemonArgs = {
    name: nonEmpty(values.name),
    host: nonEmpty(values.host),
    uuid: nonEmpty(values.uuid),
    wait: values['no-wait'] ? null : seconds('wait', values.wait, defaults.wait),
    retryWait: seconds('retry-wait', values['retry-wait'], defaults.retryWait),
    icon: values.icon ?? false,
    logLevel: parseLogLevel(values['log-level'], defaults.logLevel),
  };

  const [command, action, ...rest] = positionals;
  if (command === undefined) {
    return { kind: 'help' };
  }
  if (command === 'connect') {
    if (action !== undefined) {
      throw new UsageError(`unexpected argument "${action}"`);
    }
    return { kind: 'connect', args };
  }
  if (command === 'service') {
    const serviceAction = SERVICE_ACTIONS.find((entry) => entry === action);
    if (!serviceAction) {
      throw new UsageError(`service expects one of ${SERVICE_ACTIONS.join('|')}`);
    }
    if (rest.length > 0) {
      throw new UsageError(`unexpected argument "${rest[0]}"`);
    }
    return { kind: 'service', action: serviceAction, args };
  }
  throw new UsageError(`unknown command "${command}"`);
}

/**
 * The `connect` argv that reproduces a saved session.
 */
export function toConnectArgv(args: DaemonArgs): string[] {
  const argv = ['connect'];
  if (args.name) argv.push('--name', args.name);
  if (args.host) argv.push('--host', args.host);
  if (args.uuid) argv.push('--uuid', args.uuid);
  if (args.wait === null) {
    argv.push('--no-wait');
  } else {
    argv.push('--wait', String(args.wait));
  }
  argv.push('--retry-wait', args.retryWait === null ? 'none' : String(args.retryWait));
  if (args.icon) argv.push('--icon');
  argv.push('--log-level', args.logLevel);
  return argv;
}
