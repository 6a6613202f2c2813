import {
  BrowserSessionManager,
  withSession,
} from '../../../src/application/services/BrowserSessionManager';
import {
  EngineLaunchError,
  RunCancelledError,
  SessionNotReadyError,
} from '../../../src/domain/errors/HarvestErrors';
import {
  FakeBrowserEngine,
  FakePage,
  LAUNCH_OPTIONS,
  delay,
} from '../../helpers/FakeBrowser';

describe('BrowserSessionManager', () => {
  let engine: FakeBrowserEngine;
  let session: BrowserSessionManager;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    engine = new FakeBrowserEngine();
    session = new BrowserSessionManager(engine);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('start', () => {
    it('should become ready after launching the engine', async () => {
      await session.start(LAUNCH_OPTIONS);

      expect(session.state).toBe('ready');
      expect(engine.launches).toEqual([LAUNCH_OPTIONS]);
    });

    it('should refuse to start twice', async () => {
      await session.start(LAUNCH_OPTIONS);

      await expect(session.start(LAUNCH_OPTIONS)).rejects.toBeInstanceOf(SessionNotReadyError);
      expect(engine.launches).toHaveLength(1);
    });

    it('should surface EngineLaunchError and end closed when the engine is missing', async () => {
      const missing = new EngineLaunchError('firefox', 'browser executable not found');
      session = new BrowserSessionManager(new FakeBrowserEngine({ failWith: missing }));

      await expect(session.start(LAUNCH_OPTIONS)).rejects.toBe(missing);
      expect(session.state).toBe('closed');
      await expect(session.openPage()).rejects.toBeInstanceOf(SessionNotReadyError);
    });

    it('should wrap other launch failures as EngineLaunchError', async () => {
      session = new BrowserSessionManager(
        new FakeBrowserEngine({ failWith: new Error('spawn EACCES') })
      );

      await expect(session.start(LAUNCH_OPTIONS)).rejects.toThrow(
        'Failed to launch firefox: spawn EACCES'
      );
    });

    it('should abandon a slow launch when cancelled and close the late connection', async () => {
      engine = new FakeBrowserEngine({ launchDelayMs: 50 });
      session = new BrowserSessionManager(engine);
      const controller = new AbortController();

      const starting = session.start(LAUNCH_OPTIONS, controller.signal);
      controller.abort(new RunCancelledError('received SIGINT'));

      await expect(starting).rejects.toThrow('Run cancelled: received SIGINT');
      expect(session.state).toBe('closed');

      await delay(100);
      expect(engine.connections).toHaveLength(1);
      expect(engine.connections[0].closeCount).toBe(1);
    });
  });

  describe('openPage', () => {
    it('should reject before the session starts', async () => {
      await expect(session.openPage()).rejects.toThrow(
        'Cannot open a page: session is idle'
      );
    });

    it('should hand out numbered pages', async () => {
      await session.start(LAUNCH_OPTIONS);

      const first = await session.openPage();
      const second = await session.openPage();

      expect(first.id).toBe('page-1');
      expect(second.id).toBe('page-2');
      expect(session.openPages).toBe(2);
    });

    it('should reject after the session closed', async () => {
      await session.start(LAUNCH_OPTIONS);
      await session.close();

      await expect(session.openPage()).rejects.toThrow('Cannot open a page: session is closed');
    });
  });

  describe('close', () => {
    it('should close every page and the engine exactly once', async () => {
      await session.start(LAUNCH_OPTIONS);
      await session.openPage();
      await session.openPage();

      await Promise.all([session.close(), session.close()]);
      await session.close();

      expect(session.state).toBe('closed');
      expect(engine.connections[0].closeCount).toBe(1);
      expect(engine.pages.map(page => page.closeCount)).toEqual([1, 1]);
      expect(session.openPages).toBe(0);
    });

    it('should close an idle session without launching', async () => {
      await session.close();

      expect(session.state).toBe('closed');
      expect(engine.launches).toHaveLength(0);
    });

    it('should keep tearing down when a page fails to close', async () => {
      const broken = new FakePage();
      broken.close = jest.fn().mockRejectedValue(new Error('already gone'));
      engine = new FakeBrowserEngine({ pageFactory: () => broken });
      session = new BrowserSessionManager(engine);
      await session.start(LAUNCH_OPTIONS);
      await session.openPage();

      await session.close();

      expect(session.state).toBe('closed');
      expect(engine.connections[0].closeCount).toBe(1);
    });

    it('should reject page work once closing has begun', async () => {
      await session.start(LAUNCH_OPTIONS);
      const page = await session.openPage();
      await session.close();

      await expect(page.exclusive('click', async () => 'clicked')).rejects.toThrow(
        'Cannot click: session is closed'
      );
    });
  });

  describe('withSession', () => {
    it('should close the session when the work succeeds', async () => {
      const result = await withSession(session, LAUNCH_OPTIONS, async () => 'harvested');

      expect(result).toBe('harvested');
      expect(session.state).toBe('closed');
      expect(engine.connections[0].closeCount).toBe(1);
    });

    it('should close the session when the work fails', async () => {
      await expect(
        withSession(session, LAUNCH_OPTIONS, async () => {
          throw new Error('step failed');
        })
      ).rejects.toThrow('step failed');

      expect(session.state).toBe('closed');
      expect(engine.connections[0].closeCount).toBe(1);
    });
  });
});
