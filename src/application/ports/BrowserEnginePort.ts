import { PagePort } from './PagePort';

export type EngineName = 'firefox' | 'chromium' | 'webkit';

/**
 * Options for launching the browser engine.
 */
export interface LaunchOptions {
  engine: EngineName;
  headless: boolean;
  /** Extra command line arguments for the engine process */
  args: string[];
  viewport: { width: number; height: number };
  userAgent?: string;
  /** Hide automation markers such as navigator.webdriver */
  stealth: boolean;
}

/**
 * A running engine process and its browsing context.
 */
export interface EngineConnection {
  newPage(): Promise<PagePort>;
  close(): Promise<void>;
}

/**
 * Port interface for starting a browser engine.
 * `launch` rejects with EngineLaunchError when the engine cannot start.
 */
export interface BrowserEnginePort {
  launch(options: LaunchOptions): Promise<EngineConnection>;
}
