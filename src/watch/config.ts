/**
 * Config.ts
 * Config for watching, read from the environment (.env is loaded first)
 */

import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { Paths, WatchConfig } from './types';
import { ConfigError } from './errors';

dotenv.config();

const optionalInt = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))
  .pipe(z.coerce.number().int().positive().optional());

const intWithDefault = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : String(fallback)))
    .pipe(z.coerce.number().int().nonnegative());

const secondsWithDefault = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : String(fallback)))
    .pipe(z.coerce.number().int().positive({ message: 'must be at least 1 second' }));

const envSchema = z.object({
  MOODLE_BASE_URL: z.string().trim().url().default('https://courses.gdut.edu.cn'),
  MOODLE_COOKIE: z.string().trim().optional(),
  MOODLE_SESSION: z.string().trim().optional(),
  HTTP_TIMEOUT_MS: intWithDefault(20_000),
  WATCH_DURATION: secondsWithDefault(300),
  WATCH_INTERVAL: secondsWithDefault(60),
  WATCH_TARGET: optionalInt,
  WATCH_GAP: intWithDefault(5),
  WATCH_LIMIT: optionalInt,
  WATCH_RESOURCE_ID: optionalInt,
  WATCH_COURSE_ID: optionalInt,
  WATCH_VIDEO_ID: optionalInt,
  WATCH_PROBE: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),
  WATCH_ONLY_INCOMPLETE: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === undefined || v === 'true' || v === '1'),
  WATCH_TEMPLATE: z.string().trim().min(1).default('payload.json'),
});

// full Cookie header wins; a bare MoodleSession value is wrapped
export function cookieHeaderFrom(cookie?: string, session?: string): string | null {
  if (cookie) return cookie;
  return session ? `MoodleSession=${session}` : null;
}

// returns current watch settings; throws ConfigError listing every bad variable
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): WatchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    baseUrl: e.MOODLE_BASE_URL.replace(/\/+$/, ''),
    cookieHeader: cookieHeaderFrom(e.MOODLE_COOKIE, e.MOODLE_SESSION),
    timeoutMs: e.HTTP_TIMEOUT_MS,
    durationSeconds: e.WATCH_DURATION,
    intervalSeconds: e.WATCH_INTERVAL,
    targetSeconds: e.WATCH_TARGET ?? null,
    gapSeconds: e.WATCH_GAP,
    maxCount: e.WATCH_LIMIT ?? null,
    resourceIdOverride: e.WATCH_RESOURCE_ID ?? null,
    onlyIncomplete: e.WATCH_ONLY_INCOMPLETE,
    courseId: e.WATCH_COURSE_ID ?? null,
    videoId: e.WATCH_VIDEO_ID ?? null,
    probe: e.WATCH_PROBE,
    templateFile: e.WATCH_TEMPLATE,
  };
}

// Computes abs paths derived from config
// Reads the template relative to cwd and logs results to out/results_<COURSE_ID>.ndjson
export function getPaths(cfg: WatchConfig, cwd: string = process.cwd()): Paths {
  const templatePath = path.resolve(cwd, cfg.templateFile);
  const outDir = path.join(cwd, 'out');
  const resultsPath = path.join(outDir, `results_${cfg.courseId ?? 'adhoc'}.ndjson`);
  return { templatePath, outDir, resultsPath };
}
