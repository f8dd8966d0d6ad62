import { test, expect } from '@playwright/test';
import { parseTemplate, projectedProgress, renderTemplate } from '../src/watch/template';
import { MalformedTemplateError } from '../src/watch/errors';
import type { ResourceContext, SimulationState } from '../src/watch/types';

const ctx: ResourceContext = {
  courseId: 2545,
  contextInstanceId: 159716,
  videoId: 159716,
  resourceId: 89161,
  sessionKey: 'abc',
  name: 'Lecture 1',
  declaredDurationSeconds: null,
  sessionTimeoutSeconds: null,
};

function stateAt(watchedSeconds: number, overrides: Partial<SimulationState> = {}): SimulationState {
  return { tick: 1, watchedSeconds, targetSeconds: 100, tickSeconds: 50, elapsedWallSeconds: 0, finished: false, ...overrides };
}

const NOW = 1_700_000_000_123;

test.describe('renderTemplate', () => {
  test('first tick of a two-tick plan claims half and keeps finish as authored', () => {
    const template = parseTemplate('{"progress": 0, "finish": 0, "time": "{time}"}');
    expect(renderTemplate(template, stateAt(0), ctx, NOW)).toEqual({ progress: 0.5, finish: 0, time: 0 });
  });

  test('last tick claims full progress and sets finish', () => {
    const template = parseTemplate('{"progress": 0, "finish": 0, "time": "{time}"}');
    expect(renderTemplate(template, stateAt(50, { tick: 2 }), ctx, NOW)).toEqual({ progress: 1, finish: 1, time: 50 });
  });

  test('substitutes every known token with its typed value', () => {
    const template = parseTemplate(
      JSON.stringify({
        sesskey: '{sesskey}',
        timestamp: '{timestamp}',
        courseId: '{courseId}',
        contextInstanceId: '{contextInstanceId}',
        videoId: '{videoId}',
        fsresourceid: '{fsresourceid}',
        time: '{time}',
      }),
    );
    expect(renderTemplate(template, stateAt(37.9), ctx, NOW)).toEqual({
      sesskey: 'abc',
      timestamp: 1_700_000_000,
      courseId: 2545,
      contextInstanceId: 159716,
      videoId: 159716,
      fsresourceid: 89161,
      time: 37,
    });
  });

  test('interpolates tokens inside longer strings and leaves unknown ones alone', () => {
    const template = parseTemplate('{"url": "/mod/fsresource/view.php?id={videoId}&k={sesskey}", "x": "{nope}"}');
    expect(renderTemplate(template, stateAt(0), ctx, NOW)).toEqual({
      url: '/mod/fsresource/view.php?id=159716&k=abc',
      x: '{nope}',
    });
  });

  test('missing optional ids render as null or empty text', () => {
    const template = parseTemplate('{"c": "{courseId}", "label": "course-{courseId}"}');
    expect(renderTemplate(template, stateAt(0), { ...ctx, courseId: null }, NOW)).toEqual({ c: null, label: 'course-' });
  });

  test('overrides progress, finish and unique inside args of a batched call', () => {
    const template = parseTemplate(
      '[{"index":0,"methodname":"mod_x_set","args":{"fsresourceid":"{fsresourceid}","progress":"0","finish":0,"unique":"","time":"{time}"}}]',
    );
    expect(renderTemplate(template, stateAt(80, { tick: 3 }), ctx, NOW)).toEqual([
      {
        index: 0,
        methodname: 'mod_x_set',
        args: { fsresourceid: 89161, progress: 1, finish: 1, unique: `${NOW}_3`, time: 80 },
      },
    ]);
  });

  test('object keys are not treated as placeholders', () => {
    const template = parseTemplate('{"{time}": "{time}"}');
    expect(renderTemplate(template, stateAt(10), ctx, NOW)).toEqual({ '{time}': 10 });
  });

  test('rendering twice with the same inputs gives the same body', () => {
    const template = parseTemplate('[{"args":{"progress":0,"t":"{timestamp}","time":"{time}"}}]');
    const state = stateAt(25);
    expect(renderTemplate(template, state, ctx, NOW)).toEqual(renderTemplate(template, state, ctx, NOW));
  });

  test('does not modify the parsed template', () => {
    const template = parseTemplate('{"progress": 0, "time": "{time}"}');
    renderTemplate(template, stateAt(50), ctx, NOW);
    expect(template).toEqual({ progress: 0, time: '{time}' });
  });
});

test.describe('projectedProgress', () => {
  test('stays within [0, 1] and rounds to two decimals', () => {
    expect(projectedProgress(stateAt(0, { targetSeconds: 300, tickSeconds: 60 }))).toBe(0.2);
    expect(projectedProgress(stateAt(0, { targetSeconds: 7, tickSeconds: 1 }))).toBe(0.14);
    expect(projectedProgress(stateAt(290, { targetSeconds: 300, tickSeconds: 60 }))).toBe(1);
  });

  test('never decreases as watched time grows', () => {
    let previous = 0;
    for (let watched = 0; watched <= 130; watched += 13) {
      const p = projectedProgress(stateAt(watched, { targetSeconds: 130, tickSeconds: 13 }));
      expect(p).toBeGreaterThanOrEqual(previous);
      previous = p;
    }
  });
});

test.describe('parseTemplate', () => {
  test('rejects text that is not JSON', () => {
    expect(() => parseTemplate('{"progress": {time}}')).toThrow(MalformedTemplateError);
  });

  test('rejects a bare scalar', () => {
    expect(() => parseTemplate('"{time}"')).toThrow('template must be a JSON object or array');
  });
});
