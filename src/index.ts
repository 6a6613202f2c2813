/**
 * page-harvest
 * Library entry point
 */

export { main } from './main';
export type { MainOptions } from './main';

// Domain
export * from './domain/errors/HarvestErrors';
export { SessionLifecycle } from './domain/session/SessionLifecycle';
export type { SessionState } from './domain/session/SessionLifecycle';
export { canTransitionLoadState } from './domain/browser/LoadState';
export type { LoadState } from './domain/browser/LoadState';
export { defineSchema, parseCount } from './domain/extraction/ExtractionRule';
export type {
  ExtractionRule,
  ExtractionSchema,
  FieldSpec,
  SchemaInput,
} from './domain/extraction/ExtractionRule';
export { defineStep, describeStep } from './domain/steps/Step';
export type { Job, Step } from './domain/steps/Step';
export { EXIT_CODES, exitCodeFor, toOutput } from './domain/result/RunResult';
export type { ExitCode, HarvestRecord, RunResult } from './domain/result/RunResult';

// Application
export type { BrowserEnginePort, EngineConnection, LaunchOptions } from './application/ports/BrowserEnginePort';
export type { ElementPort, PagePort } from './application/ports/PagePort';
export type { SinkTarget } from './application/ports/SinkTarget';
export { BrowserSessionManager, withSession } from './application/services/BrowserSessionManager';
export { Deadline } from './application/services/Deadline';
export { FieldExtractor } from './application/services/FieldExtractor';
export { HarvestRunner } from './application/services/HarvestRunner';
export type { RunPlan } from './application/services/HarvestRunner';
export { ManagedPage } from './application/services/ManagedPage';
export { PageNavigator } from './application/services/PageNavigator';
export { ResultSink } from './application/services/ResultSink';
export { RetryPolicy } from './application/services/RetryPolicy';
export { StepExecutor } from './application/services/StepExecutor';

// Infrastructure
export { PlaywrightBrowserEngine } from './infrastructure/browser/PlaywrightBrowserEngine';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export { HarvestConfigSchema } from './infrastructure/config/ConfigSchema';
export type { HarvestConfig } from './infrastructure/config/ConfigSchema';
export { CompositionRoot } from './infrastructure/di/CompositionRoot';
export { FileSinkTarget, createSinkTarget } from './infrastructure/sink/FileSinkTarget';
export { StdoutSinkTarget } from './infrastructure/sink/StdoutSinkTarget';
