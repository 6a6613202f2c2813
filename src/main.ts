#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { AdapterOverrides, CompositionRoot } from './infrastructure/di/CompositionRoot';
import { CLIInputParser } from './infrastructure/cli/CLIInputParser';
import { GracefulShutdown, SignalSource } from './infrastructure/shutdown/GracefulShutdown';
import { createSinkTarget } from './infrastructure/sink/FileSinkTarget';
import { ResultSink } from './application/services/ResultSink';
import { EXIT_CODES, ExitCode, exitCodeFor } from './domain/result/RunResult';
import { SinkWriteError, toDomainError } from './domain/errors/HarvestErrors';
import { getLogger } from './infrastructure/logging';

export interface MainOptions extends AdapterOverrides {
  env?: NodeJS.ProcessEnv;
  signals?: SignalSource;
  /** Where help text goes (default: stdout) */
  print?: (text: string) => void;
}

/**
 * Run the harvester once and resolve with the process exit code.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<ExitCode> {
  const env = options.env ?? process.env;
  const cli = CLIInputParser.parse(argv);
  const logger = getLogger('Runner');

  if (cli.help) {
    // eslint-disable-next-line no-console
    (options.print ?? console.log)(CLIInputParser.getHelpText());
    return EXIT_CODES.SUCCESS;
  }

  let container: ReturnType<typeof CompositionRoot.initialize>;
  try {
    container = CompositionRoot.initialize(cli, env, options);
  } catch (error) {
    // Configuration never loaded; still report on the sink the user asked for
    const sink = new ResultSink(
      options.sinkTarget ?? createSinkTarget(cli.output ?? (env.OUTPUT_PATH || undefined))
    );
    const failure = toDomainError(error);
    logger.error('Configuration failed', { error: failure.message });
    sink.recordError(failure);
    return flushOrReport(sink);
  }

  const shutdown = new GracefulShutdown(options.signals).register();
  shutdown.registerHandler(reason => {
    logger.warn(`Stopping after ${reason}: closing the browser before writing the result`);
  });
  try {
    const result = await container.runner.run(container.plan, shutdown.signal);
    return exitCodeFor(result);
  } catch (error) {
    return reportSinkFailure(error);
  } finally {
    shutdown.dispose();
  }
}

async function flushOrReport(sink: ResultSink): Promise<ExitCode> {
  try {
    return exitCodeFor(await sink.flush());
  } catch (error) {
    return reportSinkFailure(error);
  }
}

/**
 * The result could not be written, so the failure goes to stderr instead.
 */
function reportSinkFailure(error: unknown): ExitCode {
  const failure = toDomainError(error);
  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({ kind: failure.kind, message: failure.message, attempts: failure.attempts })
  );
  return failure instanceof SinkWriteError
    ? EXIT_CODES.SINK_WRITE_FAILURE
    : EXIT_CODES.RUN_FAILURE;
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = EXIT_CODES.RUN_FAILURE;
    });
}
