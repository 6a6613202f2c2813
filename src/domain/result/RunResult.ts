import { FailureKind } from '../errors/HarvestErrors';

export type HarvestRecord = Record<string, unknown>;

export interface FailureDetail {
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface SuccessResult {
  status: 'success';
  record: HarvestRecord;
}

export interface FailureResult {
  status: 'failure';
  error: FailureDetail;
}

export type RunResult = SuccessResult | FailureResult;

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ENGINE_LAUNCH_FAILURE: 1,
  RUN_FAILURE: 2,
  SINK_WRITE_FAILURE: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(result: RunResult): ExitCode {
  if (result.status === 'success') {
    return EXIT_CODES.SUCCESS;
  }
  switch (result.error.kind) {
    case 'EngineLaunchError':
      return EXIT_CODES.ENGINE_LAUNCH_FAILURE;
    case 'SinkWriteError':
      return EXIT_CODES.SINK_WRITE_FAILURE;
    default:
      return EXIT_CODES.RUN_FAILURE;
  }
}

/**
 * The serialized form: the record itself on success, `{ kind, message, attempts }` on failure.
 */
export function toOutput(result: RunResult): HarvestRecord | FailureDetail {
  return result.status === 'success' ? result.record : result.error;
}
