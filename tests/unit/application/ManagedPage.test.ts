import { ManagedPage, SessionGuard } from '../../../src/application/services/ManagedPage';
import { SessionNotReadyError } from '../../../src/domain/errors/HarvestErrors';
import { FakePage, delay } from '../../helpers/FakeBrowser';

describe('ManagedPage', () => {
  let ready: boolean;
  let guard: SessionGuard;
  let driver: FakePage;
  let page: ManagedPage;

  beforeEach(() => {
    ready = true;
    guard = {
      assertReady: (operation: string) => {
        if (!ready) {
          throw new SessionNotReadyError('closed', operation);
        }
      },
    };
    driver = new FakePage();
    page = new ManagedPage('page-1', driver, guard);
  });

  it('should start idle', () => {
    expect(page.loadState).toBe('idle');
    expect(page.url).toBe('about:blank');
  });

  it('should run concurrent callers one at a time, in call order', async () => {
    const events: string[] = [];
    const work = (name: string, ms: number) =>
      page.exclusive(name, async () => {
        events.push(`${name}:start`);
        await delay(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([work('slow', 30), work('fast', 1)]);

    expect(results).toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast:start', 'fast:end']);
  });

  it('should keep the queue moving after a failure', async () => {
    const failing = page.exclusive('fail', async () => {
      throw new Error('broken step');
    });
    const next = page.exclusive('next', async () => 'ok');

    await expect(failing).rejects.toThrow('broken step');
    await expect(next).resolves.toBe('ok');
  });

  it('should check the session before each piece of work', async () => {
    ready = false;

    await expect(page.exclusive('extract', async () => 'never')).rejects.toThrow(
      'Cannot extract: session is closed'
    );
  });

  it('should reject load transitions that skip loading', () => {
    expect(() => page.markLoaded()).toThrow(
      'Invalid load state transition for page-1: idle -> loaded'
    );

    page.markLoading();
    page.markFailed();
    page.markLoading();
    page.markLoaded();
    expect(page.loadState).toBe('loaded');
  });

  it('should close the driver once', async () => {
    await page.close();
    await page.close();

    expect(driver.closeCount).toBe(1);
    expect(page.isClosed).toBe(true);
  });
});
