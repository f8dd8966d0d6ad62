/**
 * courses.ts
 *
 * Finds the fsresource videos on a course view page (/course/view.php?id=N).
 *
 * Themes differ, so an item counts as a video when either
 * - it links to /mod/fsresource/view.php?id=N, or
 * - its activity icon is the video icon (id taken from data-id)
 * Completion comes from the completion widget, or a 待办事项 (to-do) button.
 */

import * as cheerio from 'cheerio';
import type { VideoItem } from './types';
import { toId } from './extract';

const FSRESOURCE_LINK_RE = /\/mod\/fsresource\/view\.php\?id=(\d+)/;

export function coursePagePath(courseId: number): string {
  return `/course/view.php?id=${courseId}`;
}

export type CompletionMarkup = {
  state?: string;
  classes?: string;
  hasTodoButton: boolean;
};

// true = incomplete, false = done, null = page does not say
export function readCompletion({ state, classes, hasTodoButton }: CompletionMarkup): boolean | null {
  if (state !== undefined) {
    return /^\d+$/.test(state) ? Number(state) === 0 : null;
  }
  if (classes !== undefined) {
    if (/\bcompleted\b/.test(classes)) return false;
    if (/\b(incomplete|notcompleted)\b/.test(classes)) return true;
  }
  return hasTodoButton ? true : null;
}

export function parseCourseVideos(html: string): VideoItem[] {
  const $ = cheerio.load(html);
  const items: VideoItem[] = [];

  $('li.activity').each((_i, el) => {
    const li = $(el);
    const a = li.find("a[href*='mod/fsresource/view.php?id=']").first();
    let href = a.attr('href') ?? null;
    let id: number | null = null;
    let name: string | null = null;

    const m = href ? href.match(FSRESOURCE_LINK_RE) : null;
    if (m) {
      id = Number(m[1]);
      name = a.text().trim() || a.attr('title') || null;
    }

    const icon = li.find('img.activityicon').first();
    if (icon.length && (icon.attr('src') ?? '').includes('/f/video')) {
      id = id ?? toId(icon.attr('data-id'));
      if (name === null) name = li.find('.instancename').first().text().trim() || null;
      if (href === null && id !== null) href = `/mod/fsresource/view.php?id=${id}`;
    }

    if (id === null) return;
    const comp = li.find('.activity-completion').first();
    items.push({
      id,
      name: name ?? `fsresource-${id}`,
      url: href ?? `/mod/fsresource/view.php?id=${id}`,
      incomplete: readCompletion({
        state: comp.attr('data-completionstate') ?? comp.attr('data-state'),
        classes: comp.length ? comp.attr('class') ?? '' : undefined,
        hasTodoButton: li.find('button').filter((_j, b) => $(b).text().includes('待办事项')).length > 0,
      }),
    });
  });

  // some themes render sections without li.activity
  if (items.length === 0) {
    $('a[href]').each((_i, el) => {
      const href = $(el).attr('href') ?? '';
      const m = href.match(FSRESOURCE_LINK_RE);
      if (!m) return;
      const id = Number(m[1]);
      items.push({ id, name: $(el).text().trim() || $(el).attr('title') || `fsresource-${id}`, url: href, incomplete: null });
    });
  }

  const seen = new Set<number>();
  return items.filter((it) => {
    if (seen.has(it.id)) return false;
    seen.add(it.id);
    return true;
  });
}
