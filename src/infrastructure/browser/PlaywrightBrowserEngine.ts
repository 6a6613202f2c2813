import * as fs from 'fs';
import { Browser, BrowserContext, BrowserType, chromium, firefox, webkit } from 'playwright';
import {
  BrowserEnginePort,
  EngineConnection,
  EngineName,
  LaunchOptions,
} from '../../application/ports/BrowserEnginePort';
import { PagePort } from '../../application/ports/PagePort';
import { DetachedPageError, EngineLaunchError } from '../../domain/errors/HarvestErrors';
import { Logger, getLogger } from '../logging';
import { PlaywrightPageAdapter, translateError } from './PlaywrightPageAdapter';

/**
 * Configuration for the PlaywrightBrowserEngine.
 */
export interface PlaywrightEngineConfig {
  /** Maximum time for the engine process to come up in milliseconds */
  launchTimeoutMs?: number;
  /** Use this browser binary instead of the one Playwright installed */
  executablePath?: string;
}

const DEFAULT_CONFIG: Required<Omit<PlaywrightEngineConfig, 'executablePath'>> = {
  launchTimeoutMs: 30000,
};

const BROWSER_TYPES: Record<EngineName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

/**
 * Hides the automation flag most bot checks look at first.
 */
const STEALTH_INIT_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

class PlaywrightConnection implements EngineConnection {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext
  ) {}

  async newPage(): Promise<PagePort> {
    try {
      const page = await this.context.newPage();
      return new PlaywrightPageAdapter(page);
    } catch (error) {
      throw translateError(error, 'open a page', () => new DetachedPageError('open a page', error));
    }
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

/**
 * Playwright implementation of BrowserEnginePort.
 * Checks that the engine binary exists before launching so a missing install
 * fails immediately instead of hanging.
 */
export class PlaywrightBrowserEngine implements BrowserEnginePort {
  private readonly config: PlaywrightEngineConfig & typeof DEFAULT_CONFIG;
  private readonly logger: Logger;

  constructor(config: PlaywrightEngineConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = getLogger('Session').child('Playwright');
  }

  async launch(options: LaunchOptions): Promise<EngineConnection> {
    const browserType = BROWSER_TYPES[options.engine];
    const executablePath = this.resolveExecutable(browserType, options.engine);

    let browser: Browser;
    try {
      browser = await browserType.launch({
        headless: options.headless,
        args: options.args,
        timeout: this.config.launchTimeoutMs,
        executablePath: this.config.executablePath,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
      throw new EngineLaunchError(options.engine, reason, error);
    }
    this.logger.debug('Engine process started', { executablePath, version: browser.version() });

    try {
      const context = await browser.newContext({
        viewport: options.viewport,
        userAgent: options.userAgent,
      });
      if (options.stealth) {
        await context.addInitScript(STEALTH_INIT_SCRIPT);
      }
      return new PlaywrightConnection(browser, context);
    } catch (error) {
      await browser.close();
      const reason = error instanceof Error ? error.message : String(error);
      throw new EngineLaunchError(options.engine, `could not create a browser context: ${reason}`, error);
    }
  }

  private resolveExecutable(browserType: BrowserType, engine: EngineName): string {
    let executablePath: string;
    try {
      executablePath = this.config.executablePath ?? browserType.executablePath();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EngineLaunchError(engine, reason, error);
    }

    if (!fs.existsSync(executablePath)) {
      throw new EngineLaunchError(
        engine,
        `browser executable not found at ${executablePath} (install it with "npx playwright install ${engine}")`
      );
    }
    return executablePath;
  }
}
