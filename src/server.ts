#!/usr/bin/env node
import './runtime/registerPaths';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { loadConfig, type AppConfig } from '@/config';
import { UsageError } from '@/domain/errors';
import { RC_USAGE } from '@/domain/exitCodes';
import { createRuntime } from '@/runtime/bootstrap';
import { parseCli, USAGE, type CliCommand } from '@/runtime/cli';
import { registerShutdownHandlers } from '@/runtime/shutdown';

function readCommand(argv: string[], config: AppConfig): CliCommand | null {
  try {
    return parseCli(argv, config.env);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return null;
    }
    throw error;
  }
}

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  const command = readCommand(argv, config);
  if (!command) {
    return RC_USAGE;
  }

  const runtime = createRuntime({ config });
  const shutdown = registerShutdownHandlers(runtime);
  const code = await runtime.run(command);
  if (command.kind === 'connect') {
    // Exits the process; the session bus connection would keep it alive.
    await shutdown(code);
  }
  return code;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const log = createLogger('Server');
    log.error('fatal error', { message: errorMessage(error) });
    process.exit(1);
  });
