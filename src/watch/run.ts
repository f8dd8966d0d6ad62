/**
 * run.ts
 *
 * Runs the end-to-end watch:
 * - loads the request template and resume state
 * - lists the course's fsresource videos (incomplete ones by default)
 * - watches each remaining video in order, appending one NDJSON line per video
 *
 * a single-video watch for one cmid, outside any course listing,
 * and a one-shot probe that sends a single report and prints what came back,
 * for checking a freshly captured template before a long run.
 */

import type { BatchEntry, Logger, MoodleSession, RequestTemplate, ResourceRef, SimulationState, WatchConfig } from './types';
import { getDefaultConfig, getPaths } from './config';
import { appendResult, ensureDirs, loadProcessed, loadTemplate, toRecord } from './io';
import { coursePagePath, parseCourseVideos } from './courses';
import { type BatchOptions, resourcePagePath, runBatch } from './batch';
import { resolveResource } from './resolve';
import { renderTemplate } from './template';
import { effectiveTickSeconds, resolveTargetSeconds, serviceInfo } from './simulator';
import type { Clock } from './clock';
import { progressView, snippet } from './errors';

export type RunOptions = {
  clock?: Clock;
  signal?: AbortSignal;
  log?: Logger;
  cwd?: string;
};

export async function runCourseWatch(
  session: MoodleSession,
  cfg: WatchConfig = getDefaultConfig(),
  opts: RunOptions = {},
): Promise<BatchEntry[]> {
  const log = opts.log ?? console;
  if (cfg.courseId === null) throw new Error('WATCH_COURSE_ID is required to watch a course');

  const paths = getPaths(cfg, opts.cwd);
  // template first: a broken template must fail before any request goes out
  const template = await loadTemplate(paths.templatePath);
  await ensureDirs(paths);
  const processed = await loadProcessed(paths.resultsPath, log);

  const html = await session.fetchPage(coursePagePath(cfg.courseId));
  let items = parseCourseVideos(html);
  log.log(`Course ${cfg.courseId}: found ${items.length} video resources`);

  if (cfg.onlyIncomplete) items = items.filter((it) => it.incomplete === true);
  const pending: ResourceRef[] = items
    .filter((it) => !processed.has(it.id))
    .map((it) => ({ videoId: it.id, name: it.name }));

  if (pending.length === 0) {
    log.log('No videos left to watch.');
    return [];
  }

  return runBatch(session, pending, batchOptions(cfg, template, paths.resultsPath, opts, log));
}

// Watches one video by cmid, outside any course listing; the result goes to results_adhoc.ndjson
// (or the course log when WATCH_COURSE_ID is also set).
export async function runVideoWatch(
  session: MoodleSession,
  cfg: WatchConfig,
  videoId: number,
  opts: RunOptions = {},
): Promise<BatchEntry | null> {
  const log = opts.log ?? console;
  const paths = getPaths(cfg, opts.cwd);
  const template = await loadTemplate(paths.templatePath);
  await ensureDirs(paths);

  const results = await runBatch(session, [{ videoId }], batchOptions(cfg, template, paths.resultsPath, opts, log));
  return results[0] ?? null;
}

function batchOptions(
  cfg: WatchConfig,
  template: RequestTemplate,
  resultsPath: string,
  opts: RunOptions,
  log: Logger,
): BatchOptions {
  return {
    template,
    durationSeconds: cfg.durationSeconds,
    intervalSeconds: cfg.intervalSeconds,
    targetSeconds: cfg.targetSeconds,
    gapSeconds: cfg.gapSeconds,
    maxCount: cfg.maxCount,
    resourceIdOverride: cfg.resourceIdOverride,
    clock: opts.clock,
    signal: opts.signal,
    log,
    onResult: (entry) => appendResult(resultsPath, toRecord(entry)),
  };
}

export type ProbeResult = {
  raw: string;
  status: unknown;
  progress: unknown;
  totaltime: unknown;
  completion: unknown;
};

// small fixed watch time: enough for the server to echo fields, not enough to count
const PROBE_SECONDS = 3;

export async function probeService(
  session: MoodleSession,
  cfg: WatchConfig,
  videoId: number,
  opts: RunOptions = {},
): Promise<ProbeResult | null> {
  const log = opts.log ?? console;
  const now = opts.clock ? opts.clock.now() : Date.now();
  const template = await loadTemplate(getPaths(cfg, opts.cwd).templatePath);

  const html = await session.fetchPage(resourcePagePath(videoId));
  const resolved = await resolveResource({
    html,
    videoId,
    overrides: { resourceId: cfg.resourceIdOverride },
    fetchPage: (path) => session.fetchPage(path),
    lookupModuleInstance: (cmid, sesskey) => session.lookupModuleInstance(cmid, sesskey),
    log,
  });
  if (!resolved.ok) {
    log.error(`[video ${videoId}] ${resolved.error}`);
    return null;
  }

  const ctx = resolved.context;
  const state: SimulationState = {
    tick: 1,
    watchedSeconds: PROBE_SECONDS,
    targetSeconds: resolveTargetSeconds(cfg, ctx),
    tickSeconds: effectiveTickSeconds(cfg.intervalSeconds, ctx.sessionTimeoutSeconds),
    elapsedWallSeconds: 0,
    finished: false,
  };
  const body = renderTemplate(template, state, ctx, now);
  const reply = await session.postService(body, { sesskey: ctx.sessionKey, timestampMs: now, info: serviceInfo(template) });

  log.log(`Raw reply: ${snippet(reply.raw, 500)}`);
  const view = progressView(reply.json) ?? {};
  const result: ProbeResult = {
    raw: reply.raw,
    status: view.status,
    progress: view.progress,
    totaltime: view.totaltime,
    completion: view.completion,
  };
  log.log(
    `Parsed: status=${String(result.status)} progress=${String(result.progress)} ` +
      `totaltime=${String(result.totaltime)} completion=${String(result.completion)}`,
  );
  return result;
}
