import { HarvestRunner, RunPlan } from '../../../src/application/services/HarvestRunner';
import { PageNavigator } from '../../../src/application/services/PageNavigator';
import { ResultSink } from '../../../src/application/services/ResultSink';
import { RetryPolicy } from '../../../src/application/services/RetryPolicy';
import { StepExecutor } from '../../../src/application/services/StepExecutor';
import { defineSchema } from '../../../src/domain/extraction/ExtractionRule';
import {
  EngineLaunchError,
  NavigationError,
  RunCancelledError,
  SinkWriteError,
} from '../../../src/domain/errors/HarvestErrors';
import { exitCodeFor } from '../../../src/domain/result/RunResult';
import { Job } from '../../../src/domain/steps/Step';
import { FakeBrowserEngine, FakePage, LAUNCH_OPTIONS, el } from '../../helpers/FakeBrowser';
import { MemorySinkTarget } from '../../helpers/MemorySinkTarget';

const TITLE_JOB: Job = {
  name: 'title',
  steps: [
    { type: 'navigate', url: 'https://example.test/' },
    {
      type: 'extract',
      schema: defineSchema([
        { name: 'title', rule: { kind: 'text', selector: 'title' }, required: true },
      ]),
    },
  ],
};

const HEADING_JOB: Job = {
  name: 'heading',
  steps: [
    { type: 'navigate', url: 'https://example.test/about' },
    {
      type: 'extract',
      schema: defineSchema([{ name: 'heading', rule: { kind: 'text', selector: 'h1' } }]),
    },
  ],
};

const FULL_JOB: Job = {
  name: 'full',
  steps: [
    { type: 'navigate', url: 'https://example.test/search' },
    { type: 'wait_for', selector: '#main', timeoutMs: 20 },
    { type: 'submit', fields: [{ selector: '#q', value: 'tea' }], submitSelector: 'button', timeoutMs: 20 },
    {
      type: 'extract',
      schema: defineSchema([
        { name: 'title', rule: { kind: 'text', selector: 'title' }, required: true },
        { name: 'heading', rule: { kind: 'text', selector: 'h1' } },
      ]),
    },
  ],
};

function plan(jobs: Job[], runTimeoutMs = 5000): RunPlan {
  return { launch: LAUNCH_OPTIONS, jobs, runTimeoutMs };
}

describe('HarvestRunner', () => {
  let configurePage: (page: FakePage) => void;
  let engine: FakeBrowserEngine;
  let target: MemorySinkTarget;

  function buildRunner(engineOverride?: FakeBrowserEngine, sinkTarget?: MemorySinkTarget): HarvestRunner {
    const executor = new StepExecutor(
      new PageNavigator(),
      new RetryPolicy({
        maxAttempts: 2,
        backoff: { baseDelayMs: 1, maxDelayMs: 1, factor: 1, jitter: 0 },
      }),
      1000
    );
    return new HarvestRunner(
      engineOverride ?? engine,
      executor,
      new ResultSink(sinkTarget ?? target)
    );
  }

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    configurePage = () => undefined;
    engine = new FakeBrowserEngine({
      pageFactory: () => {
        const page = new FakePage({
          title: [el('Example Domain')],
          h1: [el('Welcome')],
          '#main': [el('')],
          '#q': [el('')],
          button: [el('Search')],
        });
        configurePage(page);
        return page;
      },
    });
    target = new MemorySinkTarget();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should record the harvested fields and close the session once', async () => {
    const result = await buildRunner().run(plan([FULL_JOB]));

    expect(result).toEqual({
      status: 'success',
      record: { title: 'Example Domain', heading: 'Welcome' },
    });
    expect(exitCodeFor(result)).toBe(0);
    expect(target.parsed).toEqual({ title: 'Example Domain', heading: 'Welcome' });
    expect(engine.connections[0].closeCount).toBe(1);
    expect(engine.pages[0].closeCount).toBe(1);
  });

  it('should merge the records of concurrent jobs, one page each', async () => {
    const result = await buildRunner().run(plan([TITLE_JOB, HEADING_JOB]));

    expect(result).toEqual({
      status: 'success',
      record: { title: 'Example Domain', heading: 'Welcome' },
    });
    expect(engine.pages).toHaveLength(2);
    expect(engine.pages.map(page => page.closeCount)).toEqual([1, 1]);
  });

  it('should report an engine that cannot start with exit code 1', async () => {
    const broken = new FakeBrowserEngine({
      failWith: new EngineLaunchError('firefox', 'browser executable not found at /missing'),
    });

    const result = await buildRunner(broken).run(plan([FULL_JOB]));

    expect(result).toEqual({
      status: 'failure',
      error: {
        kind: 'EngineLaunchError',
        message: 'Failed to launch firefox: browser executable not found at /missing',
        attempts: 1,
      },
    });
    expect(exitCodeFor(result)).toBe(1);
    expect(broken.pages).toHaveLength(0);
    expect(target.writes).toHaveLength(1);
  });

  describe('fault injection', () => {
    it.each([
      [
        'navigate',
        (page: FakePage) => {
          page.onGoto = async url => {
            throw new NavigationError(url, 'net::ERR_CONNECTION_RESET');
          };
        },
        'NavigationError',
        2,
      ],
      [
        'wait_for',
        (page: FakePage) => {
          delete page.elements['#main'];
        },
        'ElementNotFound',
        2,
      ],
      [
        'submit',
        (page: FakePage) => {
          delete page.elements['#q'];
        },
        'ElementNotFound',
        2,
      ],
      [
        'extract',
        (page: FakePage) => {
          delete page.elements.title;
        },
        'ExtractionError',
        1,
      ],
    ])(
      'should close the session exactly once when %s fails',
      async (_step, inject, kind, attempts) => {
        configurePage = inject;

        const result = await buildRunner().run(plan([FULL_JOB]));

        expect(result).toMatchObject({ status: 'failure', error: { kind, attempts } });
        expect(exitCodeFor(result)).toBe(2);
        expect(engine.connections[0].closeCount).toBe(1);
        expect(engine.pages[0].closeCount).toBe(1);
        expect(target.writes).toHaveLength(1);
      }
    );
  });

  it('should cancel the run when its deadline elapses', async () => {
    configurePage = page => {
      page.onGoto = () => new Promise<void>(() => undefined);
    };
    const started = Date.now();

    const result = await buildRunner().run(plan([TITLE_JOB], 100));

    expect(result).toEqual({
      status: 'failure',
      error: {
        kind: 'RunCancelledError',
        message: 'Run cancelled: run deadline of 100ms elapsed',
        attempts: 1,
      },
    });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(engine.connections[0].closeCount).toBe(1);
  });

  it('should cancel the run when the external signal fires', async () => {
    const controller = new AbortController();
    configurePage = page => {
      page.onGoto = () => {
        controller.abort(new RunCancelledError('received SIGTERM'));
        return new Promise<void>(() => undefined);
      };
    };

    const result = await buildRunner().run(plan([TITLE_JOB]), controller.signal);

    expect(result).toMatchObject({
      status: 'failure',
      error: { kind: 'RunCancelledError', message: 'Run cancelled: received SIGTERM' },
    });
    expect(exitCodeFor(result)).toBe(2);
    expect(engine.connections[0].closeCount).toBe(1);
  });

  it('should stop the other jobs when one fails', async () => {
    configurePage = page => {
      page.onGoto = async url => {
        if (url.endsWith('/about')) {
          throw new NavigationError(url, 'net::ERR_CONNECTION_RESET');
        }
        await new Promise<void>(() => undefined);
      };
    };

    const result = await buildRunner().run(plan([TITLE_JOB, HEADING_JOB]));

    expect(result).toMatchObject({ status: 'failure', error: { kind: 'NavigationError' } });
    expect(engine.connections[0].closeCount).toBe(1);
    expect(engine.pages.map(page => page.closeCount)).toEqual([1, 1]);
  });

  it('should reject with SinkWriteError after tearing down when the result cannot be written', async () => {
    const unwritable = new MemorySinkTarget(new Error('ENOSPC: no space left on device'));

    await expect(buildRunner(undefined, unwritable).run(plan([TITLE_JOB]))).rejects.toBeInstanceOf(
      SinkWriteError
    );
    expect(engine.connections[0].closeCount).toBe(1);
  });
});
