import { test, expect } from '@playwright/test';
import { resourcePagePath, runBatch } from '../src/watch/batch';
import { ManualClock } from '../src/watch/clock';
import { parseTemplate } from '../src/watch/template';
import type { BatchEntry, ResourceRef } from '../src/watch/types';
import { TerminationSignal } from '../src/watch/types';
import { FakeSession, MemoryLogger, resourcePage } from './support/fake-session';

const TEMPLATE = parseTemplate('{"progress": 0, "finish": 0, "time": "{time}"}');

function watchablePage(resourceId: number): string {
  return resourcePage({ playerdata: `{'fsresourceid':${resourceId},'sesskey':'k${resourceId}'}` });
}

const base = {
  template: TEMPLATE,
  durationSeconds: 600,
  intervalSeconds: 60,
  targetSeconds: 120,
  gapSeconds: 5,
};

test.describe('runBatch', () => {
  test('stops after maxCount attempted resources', async () => {
    const resources: ResourceRef[] = [1, 2, 3, 4, 5].map((videoId) => ({ videoId }));
    const pages = Object.fromEntries(resources.map((r) => [resourcePagePath(r.videoId), watchablePage(r.videoId + 100)]));
    const session = new FakeSession(pages, [{ completion: '已完成' }]);

    const results = await runBatch(session, resources, { ...base, maxCount: 2, clock: new ManualClock(), log: new MemoryLogger() });

    expect(results.map((r) => r.resource.videoId)).toEqual([1, 2]);
    expect(session.pageRequests).toEqual(['/mod/fsresource/view.php?id=1', '/mod/fsresource/view.php?id=2']);
  });

  test('maxCount counts resources that failed to resolve', async () => {
    const session = new FakeSession(
      {
        [resourcePagePath(1)]: resourcePage({ extra: '<p>empty</p>' }),
        [resourcePagePath(2)]: watchablePage(202),
        [resourcePagePath(3)]: watchablePage(203),
      },
      [{ completion: '已完成' }],
    );

    const results = await runBatch(session, [{ videoId: 1 }, { videoId: 2 }, { videoId: 3 }], {
      ...base,
      maxCount: 2,
      clock: new ManualClock(),
      log: new MemoryLogger(),
    });

    expect(results.map((r) => r.outcome.signal)).toEqual([
      TerminationSignal.ResolutionFailed,
      TerminationSignal.ServerReportedComplete,
    ]);
  });

  test('an unresolvable resource is recorded, sends nothing, and the batch moves on', async () => {
    const session = new FakeSession(
      {
        [resourcePagePath(10)]: resourcePage({ extra: '<p>no identifiers</p>' }),
        [resourcePagePath(11)]: watchablePage(911),
      },
      [{ completion: '已完成' }],
      { 10: new Error('HTTP 403') },
    );

    const results = await runBatch(session, [{ videoId: 10, name: 'Intro' }, { videoId: 11 }], {
      ...base,
      clock: new ManualClock(),
      log: new MemoryLogger(),
    });

    expect(results[0]).toEqual({
      resource: { videoId: 10, name: 'Intro' },
      outcome: {
        signal: TerminationSignal.ResolutionFailed,
        state: 'failed',
        ticks: 0,
        watchedSeconds: 0,
        targetSeconds: 0,
        detail:
          'could not resolve resourceId, sessionKey (tried manual-override -> playerdata -> m-cfg -> inline-markup -> my-page -> module-info)',
      },
    });
    expect(results[1].outcome.signal).toBe(TerminationSignal.ServerReportedComplete);
    expect(session.posts).toHaveLength(1);
    expect(session.posts[0].opts.sesskey).toBe('k911');
  });

  test('a page that cannot be fetched is a transport failure for that resource only', async () => {
    const session = new FakeSession({ [resourcePagePath(21)]: watchablePage(321) }, [{ completion: '已完成' }]);

    const results = await runBatch(session, [{ videoId: 20 }, { videoId: 21 }], {
      ...base,
      clock: new ManualClock(),
      log: new MemoryLogger(),
    });

    expect(results.map((r) => [r.resource.videoId, r.outcome.signal])).toEqual([
      [20, TerminationSignal.TransportError],
      [21, TerminationSignal.ServerReportedComplete],
    ]);
    expect(results[0].outcome.detail).toBe('GET /mod/fsresource/view.php?id=20 returned HTTP 404');
  });

  test('sleeps the gap between resources but not after the last', async () => {
    const session = new FakeSession(
      { [resourcePagePath(1)]: watchablePage(101), [resourcePagePath(2)]: watchablePage(102) },
      [{ completion: '已完成' }],
    );
    const clock = new ManualClock();

    await runBatch(session, [{ videoId: 1 }, { videoId: 2 }], { ...base, clock, log: new MemoryLogger() });

    expect(clock.sleeps).toEqual([5_000]);
  });

  test('applies the resourceId override to every resource', async () => {
    const session = new FakeSession({ [resourcePagePath(1)]: watchablePage(101) }, [{ completion: '已完成' }]);
    const template = parseTemplate('{"id": "{fsresourceid}"}');

    await runBatch(session, [{ videoId: 1 }], {
      ...base,
      template,
      resourceIdOverride: 555,
      clock: new ManualClock(),
      log: new MemoryLogger(),
    });

    expect(session.posts[0].body).toEqual({ id: 555 });
  });

  test('reports each result as soon as it is known and prints a summary', async () => {
    const session = new FakeSession(
      { [resourcePagePath(1)]: watchablePage(101), [resourcePagePath(2)]: resourcePage({}) },
      [{ completion: '已完成' }],
    );
    const log = new MemoryLogger();
    const reported: BatchEntry[] = [];

    await runBatch(session, [{ videoId: 1 }, { videoId: 2 }], {
      ...base,
      clock: new ManualClock(),
      log,
      onResult: (entry) => void reported.push(entry),
    });

    expect(reported.map((r) => r.resource.videoId)).toEqual([1, 2]);
    expect(log.lines[log.lines.length - 1]).toBe('Done. ok=1, fail=1, total=2');
  });

  test('cancellation during the gap stops before the next resource', async () => {
    const session = new FakeSession(
      { [resourcePagePath(1)]: watchablePage(101), [resourcePagePath(2)]: watchablePage(102) },
      [{ completion: '已完成' }],
    );
    const controller = new AbortController();

    const results = await runBatch(session, [{ videoId: 1 }, { videoId: 2 }], {
      ...base,
      clock: new ManualClock(),
      signal: controller.signal,
      log: new MemoryLogger(),
      onResult: () => controller.abort(),
    });

    expect(results).toHaveLength(1);
    expect(session.pageRequests).toEqual(['/mod/fsresource/view.php?id=1']);
  });
});
