import { HarvestRunner, RunPlan } from '../../application/services/HarvestRunner';
import { PageNavigator } from '../../application/services/PageNavigator';
import { ResultSink } from '../../application/services/ResultSink';
import { RetryPolicy } from '../../application/services/RetryPolicy';
import { StepExecutor } from '../../application/services/StepExecutor';
import { BrowserEnginePort } from '../../application/ports/BrowserEnginePort';
import { SinkTarget } from '../../application/ports/SinkTarget';
import { PlaywrightBrowserEngine } from '../browser/PlaywrightBrowserEngine';
import { ConfigFactory, ConfigOverrides } from '../config/ConfigFactory';
import { HarvestConfig } from '../config/ConfigSchema';
import { setGlobalLoggerConfig } from '../logging';
import { createSinkTarget } from '../sink/FileSinkTarget';

export interface ApplicationContainer {
  config: HarvestConfig;
  plan: RunPlan;
  runner: HarvestRunner;
  sink: ResultSink;
}

/**
 * Adapters that tests may swap for in-process stand-ins.
 */
export interface AdapterOverrides {
  engine?: BrowserEnginePort;
  sinkTarget?: SinkTarget;
}

export class CompositionRoot {
  static initialize(
    cliOptions: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
    adapters: AdapterOverrides = {}
  ): ApplicationContainer {
    // 1. Load Configuration
    const config = ConfigFactory.load(cliOptions, env);
    setGlobalLoggerConfig({
      minLevel: config.logging.level,
      jsonOutput: config.logging.json,
      useColors: config.logging.colors,
    });

    // 2. Initialize Infrastructure Adapters
    const engine =
      adapters.engine ??
      new PlaywrightBrowserEngine({
        launchTimeoutMs: config.browser.launchTimeoutMs,
        executablePath: config.browser.executablePath,
      });
    const sink = new ResultSink(adapters.sinkTarget ?? createSinkTarget(config.output.path));

    // 3. Initialize Application Services
    const retry = new RetryPolicy(ConfigFactory.toRetryConfig(config));
    const executor = new StepExecutor(new PageNavigator(), retry, config.timeouts.stepMs);
    const runner = new HarvestRunner(engine, executor, sink);

    return { config, plan: ConfigFactory.toRunPlan(config), runner, sink };
  }
}
