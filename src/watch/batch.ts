/**
 * batch.ts
 *
 * Watches a list of resources one after another.
 * Never two at once: the platform warns about simultaneous sessions.
 *
 * - fetch the resource page, resolve sesskey/fsresourceid
 * - skip (and record) resources that cannot be resolved
 * - simulate the rest to a terminal signal
 * - pause `gapSeconds` between resources, stop after `maxCount` attempts
 */

import type {
  BatchEntry,
  Logger,
  MoodleSession,
  RequestTemplate,
  ResourceRef,
  SimulationOutcome,
} from './types';
import { TerminationSignal } from './types';
import { type Clock, systemClock } from './clock';
import { resolveResource } from './resolve';
import { simulateProgress } from './simulator';

export type BatchOptions = {
  template: RequestTemplate;
  durationSeconds: number;
  intervalSeconds: number;
  targetSeconds?: number | null;
  gapSeconds: number;
  maxCount?: number | null;
  resourceIdOverride?: number | null;
  clock?: Clock;
  signal?: AbortSignal;
  log?: Logger;
  onResult?: (entry: BatchEntry) => void | Promise<void>;
};

export function resourcePagePath(videoId: number): string {
  return `/mod/fsresource/view.php?id=${videoId}`;
}

function failed(signal: TerminationSignal, detail: string): SimulationOutcome {
  return { signal, state: 'failed', ticks: 0, watchedSeconds: 0, targetSeconds: 0, detail };
}

async function watchOne(session: MoodleSession, resource: ResourceRef, opts: BatchOptions, log: Logger): Promise<SimulationOutcome> {
  let html: string;
  try {
    html = await session.fetchPage(resourcePagePath(resource.videoId));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error(`[video ${resource.videoId}] page fetch failed: ${message}`);
    return failed(TerminationSignal.TransportError, message);
  }

  const resolved = await resolveResource({
    html,
    videoId: resource.videoId,
    overrides: { resourceId: opts.resourceIdOverride ?? null },
    fetchPage: (path) => session.fetchPage(path),
    lookupModuleInstance: (cmid, sesskey) => session.lookupModuleInstance(cmid, sesskey),
    log,
  });
  if (!resolved.ok) {
    log.warn(`[video ${resource.videoId}] skipped: ${resolved.error}`);
    return failed(TerminationSignal.ResolutionFailed, resolved.error);
  }

  const { context, sources } = resolved;
  log.log(
    `[video ${resource.videoId}] sesskey via ${sources.sessionKey}, fsresourceid=${context.resourceId} via ${sources.resourceId}, ` +
      `courseId=${context.courseId ?? '?'} contextInstanceId=${context.contextInstanceId ?? '?'}`,
  );

  return simulateProgress(session, context, {
    template: opts.template,
    durationSeconds: opts.durationSeconds,
    intervalSeconds: opts.intervalSeconds,
    targetSeconds: opts.targetSeconds,
    clock: opts.clock,
    signal: opts.signal,
    log,
  });
}

export async function runBatch(session: MoodleSession, resources: ResourceRef[], opts: BatchOptions): Promise<BatchEntry[]> {
  const clock = opts.clock ?? systemClock;
  const log = opts.log ?? console;
  const limit = opts.maxCount ?? resources.length;
  const planned = resources.slice(0, Math.max(0, limit));
  const results: BatchEntry[] = [];

  log.log(`Watching ${planned.length} of ${resources.length} resources (sequential)`);

  for (const [idx, resource] of planned.entries()) {
    if (opts.signal?.aborted) {
      log.warn(`Cancelled before resource ${idx + 1}/${planned.length}`);
      break;
    }

    log.log(`(${idx + 1}/${planned.length}) video id=${resource.videoId}${resource.name ? ` name=${resource.name}` : ''}`);
    const entry: BatchEntry = { resource, outcome: await watchOne(session, resource, opts, log) };
    results.push(entry);
    log.log(`[video ${resource.videoId}] ${entry.outcome.state}: ${entry.outcome.signal}`);
    await opts.onResult?.(entry);

    if (idx < planned.length - 1 && opts.gapSeconds > 0) {
      const slept = await clock.sleep(opts.gapSeconds * 1000, opts.signal);
      if (!slept) {
        log.warn(`Cancelled after resource ${idx + 1}/${planned.length}`);
        break;
      }
    }
  }

  const ok = results.filter((r) => r.outcome.state === 'completed').length;
  log.log(`Done. ok=${ok}, fail=${results.length - ok}, total=${results.length}`);
  return results;
}
