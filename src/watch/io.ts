/**
 * io.ts
 *
 * Contains all filesystem I/O for the watcher
 * - create output directory
 * - read the request template file
 * - append results to NDJSON log
 * - load already watched video ids from NDJSON log
 */

import fs from 'node:fs/promises';
import type { BatchEntry, Logger, Paths, RequestTemplate } from './types';
import { MalformedTemplateError } from './errors';
import { parseTemplate } from './template';

// ensure output directory exists
export async function ensureDirs(paths: Paths) {
  await fs.mkdir(paths.outDir, { recursive: true });
}

// Read and parse the template once; a broken file stops the run before any request.
export async function loadTemplate(templatePath: string): Promise<RequestTemplate> {
  let raw: string;
  try {
    raw = await fs.readFile(templatePath, 'utf8');
  } catch (e) {
    throw new MalformedTemplateError(`cannot read template ${templatePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseTemplate(raw);
}

export type ResultRecord = {
  videoId: number;
  name?: string;
  ok: boolean;
  signal: string;
  ticks: number;
  watchedSeconds: number;
  targetSeconds: number;
  detail?: string;
  lastReply?: string;
  at: string;
};

export function toRecord(entry: BatchEntry, at: Date = new Date()): ResultRecord {
  const { resource, outcome } = entry;
  return {
    videoId: resource.videoId,
    ...(resource.name ? { name: resource.name } : {}),
    ok: outcome.state === 'completed',
    signal: outcome.signal,
    ticks: outcome.ticks,
    watchedSeconds: outcome.watchedSeconds,
    targetSeconds: outcome.targetSeconds,
    ...(outcome.detail ? { detail: outcome.detail } : {}),
    ...(outcome.lastReply ? { lastReply: outcome.lastReply } : {}),
    at: at.toISOString(),
  };
}

// Append one record as a single NDJSON line.
export async function appendResult(resultsPath: string, record: ResultRecord) {
  await fs.appendFile(resultsPath, JSON.stringify(record) + '\n', 'utf8');
}

// Read results_<COURSE_ID>.ndjson and return the video ids that already finished.
// Failed attempts are not counted, so they get retried on the next run.
export async function loadProcessed(resultsPath: string, log: Logger = console): Promise<Set<number>> {
  const processed = new Set<number>();
  let existing: string;
  try {
    existing = await fs.readFile(resultsPath, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return processed; // no file yet
    throw e;
  }

  for (const line of existing.split(/\r?\n/)) {
    if (!line.trim()) continue;
    let obj: unknown;
    try {
      obj = JSON.parse(line);
    } catch {
      log.warn(`Skipping malformed line in ${resultsPath}: ${line.slice(0, 80)}`);
      continue;
    }
    if (typeof obj === 'object' && obj !== null && 'videoId' in obj && 'ok' in obj && obj.ok === true) {
      processed.add(Number(obj.videoId));
    }
  }
  return processed;
}
