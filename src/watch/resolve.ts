/**
 * resolve.ts
 *
 * Builds the ResourceContext for one fsresource page.
 *
 * sesskey and fsresourceid can show up in several places depending on theme and
 * plugin version, so each place is a named strategy tried in order. The first
 * strategy that yields a value owns that field; later strategies only fill gaps.
 */

import type { Logger, ManualOverrides, ResolveField, ResolveResult } from './types';
import {
  extractDeclaredDuration,
  extractInlineResourceId,
  extractInlineSesskey,
  extractMoodleCfg,
  extractPlayerData,
  extractTitle,
  toId,
  toSesskey,
} from './extract';

export type ResolveInput = {
  html: string;
  videoId: number;
  overrides?: ManualOverrides;
  // GET within the session; used to read a sesskey off the dashboard
  fetchPage?: (path: string) => Promise<string>;
  // core_course_get_course_module lookup; null when the module has no instance
  lookupModuleInstance?: (cmid: number, sesskey: string) => Promise<number | null>;
  log?: Logger;
};

type Found = { resourceId: number | null; sessionKey: string | null };

type PageFacts = {
  playerdata: Record<string, string> | null;
  mcfg: Record<string, string> | null;
};

export type ResolveStrategy = {
  name: string;
  run(input: ResolveInput, page: PageFacts, found: Found): Promise<Found> | Found;
};

export const manualOverride: ResolveStrategy = {
  name: 'manual-override',
  run: ({ overrides }) => ({
    resourceId: overrides?.resourceId ?? null,
    sessionKey: overrides?.sessionKey || null,
  }),
};

export const playerdataStrategy: ResolveStrategy = {
  name: 'playerdata',
  run: (_input, { playerdata }) => ({
    resourceId: toId(playerdata?.fsresourceid),
    sessionKey: toSesskey(playerdata?.sesskey),
  }),
};

export const moodleCfgStrategy: ResolveStrategy = {
  name: 'm-cfg',
  run: (_input, { mcfg }) => ({ resourceId: null, sessionKey: toSesskey(mcfg?.sesskey) }),
};

export const inlineMarkupStrategy: ResolveStrategy = {
  name: 'inline-markup',
  run: ({ html }) => ({
    resourceId: extractInlineResourceId(html),
    sessionKey: extractInlineSesskey(html),
  }),
};

export const MY_PAGE_PATH = '/my/';

// every logged-in page carries the sesskey, so read it off the dashboard
export const myPageStrategy: ResolveStrategy = {
  name: 'my-page',
  async run({ videoId, fetchPage, log = console }, _page, found) {
    if (found.sessionKey !== null || !fetchPage) return { resourceId: null, sessionKey: null };
    try {
      const html = await fetchPage(MY_PAGE_PATH);
      return { resourceId: null, sessionKey: toSesskey(extractMoodleCfg(html)?.sesskey) ?? extractInlineSesskey(html) };
    } catch (e) {
      log.warn(`[video ${videoId}] ${MY_PAGE_PATH} fetch failed: ${e instanceof Error ? e.message : String(e)}`);
      return { resourceId: null, sessionKey: null };
    }
  },
};

// skipped until a sesskey is known
export const moduleInfoStrategy: ResolveStrategy = {
  name: 'module-info',
  async run({ videoId, lookupModuleInstance, log = console }, { mcfg }, found) {
    if (found.resourceId !== null || found.sessionKey === null || !lookupModuleInstance) {
      return { resourceId: null, sessionKey: null };
    }
    const cmid = toId(mcfg?.contextInstanceId) ?? videoId;
    try {
      const instance = await lookupModuleInstance(cmid, found.sessionKey);
      return { resourceId: instance, sessionKey: null };
    } catch (e) {
      log.warn(`[video ${videoId}] module-info lookup for cmid=${cmid} failed: ${e instanceof Error ? e.message : String(e)}`);
      return { resourceId: null, sessionKey: null };
    }
  },
};

export const DEFAULT_STRATEGIES: readonly ResolveStrategy[] = [
  manualOverride,
  playerdataStrategy,
  moodleCfgStrategy,
  inlineMarkupStrategy,
  myPageStrategy,
  moduleInfoStrategy,
];

export async function resolveResource(
  input: ResolveInput,
  strategies: readonly ResolveStrategy[] = DEFAULT_STRATEGIES,
): Promise<ResolveResult> {
  const page: PageFacts = {
    playerdata: extractPlayerData(input.html),
    mcfg: extractMoodleCfg(input.html),
  };

  const found: Found = { resourceId: null, sessionKey: null };
  const sources: Record<ResolveField, string | null> = { resourceId: null, sessionKey: null };
  const tried: string[] = [];

  for (const strategy of strategies) {
    if (found.resourceId !== null && found.sessionKey !== null) break;
    tried.push(strategy.name);
    const got = await strategy.run(input, page, found);
    if (found.resourceId === null && got.resourceId !== null) {
      found.resourceId = got.resourceId;
      sources.resourceId = strategy.name;
    }
    if (found.sessionKey === null && got.sessionKey !== null) {
      found.sessionKey = got.sessionKey;
      sources.sessionKey = strategy.name;
    }
  }

  const { resourceId, sessionKey } = found;
  if (resourceId === null || sessionKey === null || sources.resourceId === null || sources.sessionKey === null) {
    const missing: ResolveField[] = [];
    if (resourceId === null) missing.push('resourceId');
    if (sessionKey === null) missing.push('sessionKey');
    return { ok: false, missing, tried, error: `could not resolve ${missing.join(', ')} (tried ${tried.join(' -> ')})` };
  }

  const timeout = toId(page.mcfg?.sessiontimeout);
  return {
    ok: true,
    sources: { resourceId: sources.resourceId, sessionKey: sources.sessionKey },
    context: {
      courseId: toId(page.mcfg?.courseId),
      contextInstanceId: toId(page.mcfg?.contextInstanceId),
      videoId: input.videoId,
      resourceId,
      sessionKey,
      name: extractTitle(input.html),
      declaredDurationSeconds: toId(page.playerdata?.duration) ?? extractDeclaredDuration(input.html),
      sessionTimeoutSeconds: timeout,
    },
  };
}
