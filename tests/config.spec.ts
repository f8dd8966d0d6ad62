import { test, expect } from '@playwright/test';
import path from 'node:path';
import { cookieHeaderFrom, getDefaultConfig, getPaths } from '../src/watch/config';
import { ConfigError } from '../src/watch/errors';

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    getDefaultConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  return [];
}

test.describe('getDefaultConfig', () => {
  test('fills in defaults for an empty environment', () => {
    expect(getDefaultConfig({})).toEqual({
      baseUrl: 'https://courses.gdut.edu.cn',
      cookieHeader: null,
      timeoutMs: 20_000,
      durationSeconds: 300,
      intervalSeconds: 60,
      targetSeconds: null,
      gapSeconds: 5,
      maxCount: null,
      resourceIdOverride: null,
      onlyIncomplete: true,
      courseId: null,
      videoId: null,
      probe: false,
      templateFile: 'payload.json',
    });
  });

  test('reads overrides and trims the base URL', () => {
    const cfg = getDefaultConfig({
      MOODLE_BASE_URL: 'https://lms.example/',
      WATCH_DURATION: '900',
      WATCH_INTERVAL: '30',
      WATCH_TARGET: '600',
      WATCH_GAP: '0',
      WATCH_LIMIT: '3',
      WATCH_COURSE_ID: '2545',
      WATCH_VIDEO_ID: '159716',
      WATCH_PROBE: '1',
      WATCH_ONLY_INCOMPLETE: 'false',
      WATCH_TEMPLATE: 'templates/set_time.json',
    });

    expect(cfg.baseUrl).toBe('https://lms.example');
    expect(cfg.durationSeconds).toBe(900);
    expect(cfg.intervalSeconds).toBe(30);
    expect(cfg.targetSeconds).toBe(600);
    expect(cfg.gapSeconds).toBe(0);
    expect(cfg.maxCount).toBe(3);
    expect(cfg.courseId).toBe(2545);
    expect(cfg.videoId).toBe(159716);
    expect(cfg.probe).toBe(true);
    expect(cfg.onlyIncomplete).toBe(false);
    expect(cfg.templateFile).toBe('templates/set_time.json');
  });

  test('blank optional numbers count as unset', () => {
    const cfg = getDefaultConfig({ WATCH_TARGET: '', WATCH_LIMIT: '  ', WATCH_DURATION: '' });
    expect(cfg.targetSeconds).toBeNull();
    expect(cfg.maxCount).toBeNull();
    expect(cfg.durationSeconds).toBe(300);
  });

  test('lists every bad variable', () => {
    const issues = configIssues({ WATCH_INTERVAL: 'soon', WATCH_ONLY_INCOMPLETE: 'maybe' });
    expect(issues).toHaveLength(2);
    expect(issues.map((i) => i.split(':')[0]).sort()).toEqual(['WATCH_INTERVAL', 'WATCH_ONLY_INCOMPLETE']);
  });

  test('a zero interval or duration is rejected alongside other bad variables', () => {
    expect(configIssues({ WATCH_INTERVAL: '0' })).toEqual(['WATCH_INTERVAL: must be at least 1 second']);
    expect(configIssues({ WATCH_INTERVAL: '0', WATCH_DURATION: '0' }).sort()).toEqual([
      'WATCH_DURATION: must be at least 1 second',
      'WATCH_INTERVAL: must be at least 1 second',
    ]);
    expect(configIssues({ WATCH_INTERVAL: 'abc', WATCH_DURATION: '0' }).sort()).toEqual([
      'WATCH_DURATION: must be at least 1 second',
      'WATCH_INTERVAL: Expected number, received nan',
    ]);
    expect(() => getDefaultConfig({ WATCH_INTERVAL: '0' })).toThrow(
      'Invalid configuration: WATCH_INTERVAL: must be at least 1 second',
    );
  });
});

test.describe('cookieHeaderFrom', () => {
  test('a full cookie header wins over a bare session value', () => {
    expect(cookieHeaderFrom('MoodleSession=a; other=b', 'ignored')).toBe('MoodleSession=a; other=b');
    expect(cookieHeaderFrom(undefined, 'test-session')).toBe('MoodleSession=test-session');
    expect(cookieHeaderFrom(undefined, undefined)).toBeNull();
  });

  test('is applied by getDefaultConfig', () => {
    expect(getDefaultConfig({ MOODLE_SESSION: 'test-session' }).cookieHeader).toBe('MoodleSession=test-session');
  });
});

test.describe('getPaths', () => {
  test('resolves the template and per-course results log under cwd', () => {
    const cwd = path.resolve('/work');
    const cfg = getDefaultConfig({ WATCH_COURSE_ID: '2545' });

    expect(getPaths(cfg, cwd)).toEqual({
      templatePath: path.join(cwd, 'payload.json'),
      outDir: path.join(cwd, 'out'),
      resultsPath: path.join(cwd, 'out', 'results_2545.ndjson'),
    });
  });

  test('ad-hoc runs share one results log', () => {
    const cwd = path.resolve('/work');
    expect(getPaths(getDefaultConfig({}), cwd).resultsPath).toBe(path.join(cwd, 'out', 'results_adhoc.ndjson'));
  });
});
