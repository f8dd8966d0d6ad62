/**
 * simulator.ts
 *
 * Replays the player's progress report for one resource until it is done.
 *
 * Each tick renders the template from the current state, posts it once, and then
 * decides: server said 已完成 -> stop; watched time reached target -> stop;
 * duration budget spent -> stop; otherwise sleep one interval and go again.
 * A failed post or an expired session ends the run. There is no retry: the
 * platform flags sessions that report too often.
 */

import type {
  JsonValue,
  Logger,
  MoodleSession,
  RequestTemplate,
  ResourceContext,
  SimulationOutcome,
  SimulationState,
  TerminalState,
} from './types';
import { TerminationSignal } from './types';
import { type Clock, systemClock } from './clock';
import { extractServiceException, isCompletionReply, isNotLoggedIn, progressView, snippet, TransportError } from './errors';
import { isFinalTick, projectedProgress, renderTemplate } from './template';

export type SimulateOptions = {
  template: RequestTemplate;
  durationSeconds: number;
  intervalSeconds: number;
  targetSeconds?: number | null;
  clock?: Clock;
  signal?: AbortSignal;
  log?: Logger;
  // called with every body right before it is posted
  onTick?: (state: Readonly<SimulationState>, body: JsonValue) => void;
};

const MIN_KEEPALIVE_SECONDS = 30;

// Stay inside the session lifetime when the page declares a short one.
export function effectiveTickSeconds(intervalSeconds: number, sessionTimeoutSeconds: number | null): number {
  if (sessionTimeoutSeconds && intervalSeconds > sessionTimeoutSeconds) {
    return Math.max(MIN_KEEPALIVE_SECONDS, Math.floor(sessionTimeoutSeconds / 2));
  }
  return intervalSeconds;
}

// explicit target, else the page's duration, else the configured run length
export function resolveTargetSeconds(opts: Pick<SimulateOptions, 'targetSeconds' | 'durationSeconds'>, ctx: ResourceContext): number {
  return opts.targetSeconds || ctx.declaredDurationSeconds || opts.durationSeconds;
}

// methodname of the first batched call, sent as ?info= like the Moodle AJAX module does
export function serviceInfo(template: RequestTemplate): string | undefined {
  const first = Array.isArray(template) ? template[0] : template;
  if (typeof first === 'object' && first !== null && !Array.isArray(first) && typeof first.methodname === 'string') {
    return first.methodname;
  }
  return undefined;
}

function stateOf(signal: TerminationSignal): TerminalState {
  switch (signal) {
    case TerminationSignal.ReachedTarget:
    case TerminationSignal.ServerReportedComplete:
    case TerminationSignal.ExhaustedDuration:
      return 'completed';
    default:
      return 'failed';
  }
}

export async function simulateProgress(
  session: MoodleSession,
  ctx: ResourceContext,
  opts: SimulateOptions,
): Promise<SimulationOutcome> {
  const clock = opts.clock ?? systemClock;
  const log = opts.log ?? console;
  const tag = `[video ${ctx.videoId}]`;
  const info = serviceInfo(opts.template);

  const state: SimulationState = {
    tick: 0,
    watchedSeconds: 0,
    targetSeconds: resolveTargetSeconds(opts, ctx),
    tickSeconds: effectiveTickSeconds(opts.intervalSeconds, ctx.sessionTimeoutSeconds),
    elapsedWallSeconds: 0,
    finished: false,
  };
  const startedAt = clock.now();
  let lastReply: string | undefined;

  const finish = (signal: TerminationSignal, detail?: string): SimulationOutcome => ({
    signal,
    state: stateOf(signal),
    ticks: state.tick,
    watchedSeconds: state.watchedSeconds,
    targetSeconds: state.targetSeconds,
    ...(detail !== undefined ? { detail } : {}),
    ...(lastReply !== undefined ? { lastReply } : {}),
  });

  log.log(`${tag} target=${state.targetSeconds}s tick=${state.tickSeconds}s budget=${opts.durationSeconds}s`);

  for (;;) {
    if (opts.signal?.aborted) {
      log.warn(`${tag} cancelled before tick ${state.tick + 1}`);
      return finish(TerminationSignal.Cancelled, 'cancelled');
    }

    state.tick++;
    state.finished = isFinalTick(state);
    const nowMs = clock.now();
    const body = renderTemplate(opts.template, state, ctx, nowMs);
    opts.onTick?.(state, body);

    let json: unknown;
    try {
      const reply = await session.postService(body, { sesskey: ctx.sessionKey, timestampMs: nowMs, info });
      lastReply = snippet(reply.raw);
      json = reply.json;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      if (e instanceof TransportError && e.raw !== null) lastReply = snippet(e.raw);
      log.error(`${tag} tick ${state.tick}: post failed: ${message}`);
      return finish(TerminationSignal.TransportError, message);
    }

    // only a dead session is fatal; other service errors are one bad tick
    const ex = extractServiceException(json);
    if (ex && isNotLoggedIn(ex)) {
      log.error(`${tag} tick ${state.tick}: service error ${ex.errorcode}: ${ex.message}`);
      log.error(`${tag} session is no longer valid; refresh MOODLE_SESSION or MOODLE_COOKIE`);
      return finish(TerminationSignal.TransportError, `${ex.errorcode}: ${ex.message}`);
    }

    const view = progressView(json);
    if (ex) {
      log.warn(`${tag} tick ${state.tick}: service error ${ex.errorcode}: ${ex.message}, no completion read`);
    } else if (view === null) {
      log.warn(`${tag} tick ${state.tick}: unexpected reply, no completion read: ${lastReply ?? ''}`);
    } else if (isCompletionReply(view)) {
      log.log(`${tag} tick ${state.tick}: server reports completion`);
      return finish(TerminationSignal.ServerReportedComplete);
    } else {
      log.log(
        `${tag} tick ${state.tick}: time=${Math.floor(state.watchedSeconds)} progress=${projectedProgress(state)} ` +
          `status=${String(view.status ?? '-')} totaltime=${String(view.totaltime ?? '-')}`,
      );
    }

    state.watchedSeconds = Math.min(state.watchedSeconds + state.tickSeconds, state.targetSeconds);
    if (state.watchedSeconds >= state.targetSeconds) {
      log.log(`${tag} reached target after ${state.tick} ticks`);
      return finish(TerminationSignal.ReachedTarget);
    }

    state.elapsedWallSeconds = (clock.now() - startedAt) / 1000;
    if (state.elapsedWallSeconds >= opts.durationSeconds) {
      log.warn(`${tag} duration budget spent without server confirmation (watched ${state.watchedSeconds}s)`);
      return finish(TerminationSignal.ExhaustedDuration);
    }

    const slept = await clock.sleep(state.tickSeconds * 1000, opts.signal);
    if (!slept) {
      log.warn(`${tag} cancelled after tick ${state.tick}`);
      return finish(TerminationSignal.Cancelled, 'cancelled');
    }
  }
}
