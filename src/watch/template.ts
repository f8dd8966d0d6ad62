/**
 * template.ts
 *
 * The progress call's body is easiest to obtain by copying a real request out of
 * the browser's network tab once and replacing the per-video values with tokens.
 *
 * - parses that operator-supplied JSON once, before anything is sent
 * - renders it per tick: swaps {tokens} for context/state values
 * - overrides progress / finish / unique the way the player would fill them
 */

import type { JsonObject, JsonValue, RequestTemplate, ResourceContext, SimulationState } from './types';
import { MalformedTemplateError } from './errors';

type Accessor = (state: SimulationState, ctx: ResourceContext, nowMs: number) => string | number | null;

// every recognised token has exactly one source
export const PLACEHOLDERS = {
  sesskey: (_s, ctx) => ctx.sessionKey,
  timestamp: (_s, _c, nowMs) => Math.floor(nowMs / 1000),
  courseId: (_s, ctx) => ctx.courseId,
  contextInstanceId: (_s, ctx) => ctx.contextInstanceId,
  videoId: (_s, ctx) => ctx.videoId,
  fsresourceid: (_s, ctx) => ctx.resourceId,
  time: (s) => Math.floor(s.watchedSeconds),
} satisfies Record<string, Accessor>;

export type Placeholder = keyof typeof PLACEHOLDERS;

const TOKEN_RE = /\{(\w+)\}/g;
const WHOLE_TOKEN_RE = /^\{(\w+)\}$/;

function isPlaceholder(name: string): name is Placeholder {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseTemplate(text: string): RequestTemplate {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MalformedTemplateError(`template is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new MalformedTemplateError('template must be a JSON object or array');
  }
  return toJson(parsed);
}

function toJson(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJson);
  if (typeof value === 'object') {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) out[k] = toJson(v);
    return out;
  }
  throw new MalformedTemplateError(`unsupported template value: ${typeof value}`);
}

// Ratio the report claims once this tick's interval is counted.
export function projectedProgress(state: SimulationState): number {
  if (state.targetSeconds <= 0) return 1;
  const watched = Math.min(state.watchedSeconds + state.tickSeconds, state.targetSeconds);
  const ratio = Math.max(0, Math.min(1, watched / state.targetSeconds));
  return Math.round(ratio * 100) / 100;
}

export function isFinalTick(state: SimulationState): boolean {
  return state.watchedSeconds + state.tickSeconds >= state.targetSeconds;
}

function substitute(text: string, state: SimulationState, ctx: ResourceContext, nowMs: number): JsonValue {
  // a value that is only a token keeps the source's type (number stays number)
  const whole = text.match(WHOLE_TOKEN_RE)?.[1];
  if (whole !== undefined && isPlaceholder(whole)) {
    const accessor: Accessor = PLACEHOLDERS[whole];
    return accessor(state, ctx, nowMs);
  }
  return text.replace(TOKEN_RE, (token: string, name: string) => {
    if (!isPlaceholder(name)) return token;
    const accessor: Accessor = PLACEHOLDERS[name];
    const value = accessor(state, ctx, nowMs);
    return value === null ? '' : String(value);
  });
}

function renderValue(value: JsonValue, state: SimulationState, ctx: ResourceContext, nowMs: number): JsonValue {
  if (typeof value === 'string') return substitute(value, state, ctx, nowMs);
  if (Array.isArray(value)) return value.map((v) => renderValue(v, state, ctx, nowMs));
  if (isObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) out[k] = renderValue(v, state, ctx, nowMs);
    return out;
  }
  return value;
}

function applyOverrides(target: JsonObject, state: SimulationState, nowMs: number): void {
  if ('progress' in target) target.progress = projectedProgress(state);
  if ('finish' in target && isFinalTick(state)) target.finish = 1;
  if ('unique' in target) target.unique = `${nowMs}_${state.tick}`;
}

// Pure: same (template, state, ctx, nowMs) gives the same body.
export function renderTemplate(
  template: RequestTemplate,
  state: SimulationState,
  ctx: ResourceContext,
  nowMs: number,
): JsonValue {
  const rendered = renderValue(template, state, ctx, nowMs);

  if (isObject(rendered)) {
    applyOverrides(rendered, state, nowMs);
  } else if (Array.isArray(rendered)) {
    // Moodle batched form: [{ index, methodname, args: {...} }]
    for (const call of rendered) {
      if (isObject(call) && isObject(call.args)) applyOverrides(call.args, state, nowMs);
    }
  }
  return rendered;
}
