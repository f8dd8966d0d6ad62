/**
 * main.ts
 *
 * Entry point: reads the environment, opens a session and then
 * - WATCH_VIDEO_ID + WATCH_PROBE: sends one report for that video and prints the reply
 * - WATCH_VIDEO_ID: watches that one video
 * - otherwise: watches WATCH_COURSE_ID
 * Ctrl-C stops after the request in flight.
 */

import { createMoodleClient } from './watch/api';
import { getDefaultConfig } from './watch/config';
import { probeService, runCourseWatch, runVideoWatch } from './watch/run';

async function main(): Promise<number> {
  const cfg = getDefaultConfig();
  if (!cfg.cookieHeader) console.warn('No MOODLE_COOKIE or MOODLE_SESSION set; requests go out logged out');

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('Stopping after the current request...');
    controller.abort();
  });

  const client = await createMoodleClient(cfg);
  const opts = { signal: controller.signal };
  try {
    if (cfg.videoId !== null && cfg.probe) {
      return (await probeService(client, cfg, cfg.videoId, opts)) ? 0 : 1;
    }
    if (cfg.videoId !== null) {
      const entry = await runVideoWatch(client, cfg, cfg.videoId, opts);
      return entry?.outcome.state === 'completed' ? 0 : 1;
    }
    const results = await runCourseWatch(client, cfg, opts);
    return results.some((r) => r.outcome.state === 'failed') ? 1 : 0;
  } finally {
    await client.dispose();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  },
);
