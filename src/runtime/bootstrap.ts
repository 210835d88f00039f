import { loadConfig, type AppConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { SessionAlreadyRunningError, SessionNotRunningError } from '@/domain/errors';
import { RC_ALREADY_RUNNING, RC_NOT_RUNNING, RC_OK } from '@/domain/exitCodes';
import { deviceLabel, type DaemonArgs, type SessionRecord } from '@/domain/session/types';
import { DiscoveryLoop } from '@/application/discovery/retryLoop';
import { SessionDaemon } from '@/application/session/sessionDaemon';
import { DeviceWrapper } from '@/application/wrapper/deviceWrapper';
import { toConnectArgv, USAGE, type CliCommand, type ServiceAction } from '@/runtime/cli';
import { createRuntimePorts, type RuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

const STOP_TIMEOUT_MS = 5000;

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  run: (command: CliCommand) => Promise<number>;
  stop: () => Promise<void>;
};

export interface RuntimeOptions {
  config?: AppConfig;
  ports?: RuntimePorts;
  /** Where command output (not logging) goes. */
  output?: NodeJS.WritableStream;
  /** Node flags and script that re-run this program, e.g. for background sessions. */
  entrypoint?: string[];
}

export function describeRecord(record: SessionRecord, logFile: string): string {
  const pid = record.pid === null ? '' : ` (pid ${record.pid})`;
  return `${record.id}: ${record.status}${pid}, log: ${logFile}`;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = options.config ?? loadConfig();
  logManager.configure({
    level: config.env.logLevel,
    json: config.env.logJson,
    file: config.env.logFile ?? undefined,
  });

  const log = createLogger('Server');
  const ports = options.ports ?? createRuntimePorts(config);
  const output = options.output ?? process.stdout;
  const entrypoint = options.entrypoint ?? [...process.execArgv, process.argv[1] ?? ''];

  const loop = new DiscoveryLoop({
    transport: ports.transport,
    createAdapter: (device) =>
      new DeviceWrapper(device, {
        clock: ports.clock,
        icons: config.icons,
        desktopEntries: ports.desktopEntries,
        timeResolution: config.env.timeResolution,
      }),
    createServer: ports.createServer,
    sleep: ports.sleep,
  });

  const daemon = new SessionDaemon({
    store: ports.store,
    supervisor: ports.supervisor,
    clock: ports.clock,
    buildCommand: (args) => [...entrypoint, ...toConnectArgv(args)],
    logFile: config.session.logFile,
  });

  const services: LifecycleService[] = [
    { name: 'discovery', stop: () => loop.stop() },
    { name: 'mdns', stop: async () => ports.mdns.shutdown() },
  ];

  const print = (line: string): void => {
    output.write(`${line}\n`);
  };

  const runService = async (action: ServiceAction, args: DaemonArgs): Promise<number> => {
    const label = deviceLabel(args);
    const logFile = config.session.logFile(label);
    try {
      switch (action) {
        case 'status': {
          const record = await daemon.status(args);
          print(describeRecord(record, logFile));
          return record.status === 'running' ? RC_OK : RC_NOT_RUNNING;
        }
        case 'start':
          print(describeRecord(await daemon.start(args), logFile));
          return RC_OK;
        case 'stop':
          print(describeRecord(await daemon.stop(args), logFile));
          return RC_OK;
        case 'restart':
          print(describeRecord(await daemon.restart(args, args), logFile));
          return RC_OK;
      }
    } catch (error) {
      if (error instanceof SessionNotRunningError) {
        print(error.message);
        return RC_NOT_RUNNING;
      }
      if (error instanceof SessionAlreadyRunningError) {
        print(error.message);
        return RC_ALREADY_RUNNING;
      }
      throw error;
    }
  };

  const run = async (command: CliCommand): Promise<number> => {
    switch (command.kind) {
      case 'help':
        print(USAGE);
        return RC_OK;
      case 'connect':
        logManager.configure({ level: command.args.logLevel });
        log.info('connecting', { device: deviceLabel(command.args), wait: command.args.wait });
        return loop.runSafe(command.args);
      case 'service':
        return runService(command.action, command.args);
    }
  };

  const stop = async (): Promise<void> => {
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, STOP_TIMEOUT_MS, log);
    }
  };

  return { run, stop };
}
