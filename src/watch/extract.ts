/**
 * extract.ts
 *
 * Reads values out of a rendered fsresource page without running any of its script.
 *
 * - embedded object literals (`playerdata = {...}`, `M.cfg = {...};`) -> flat string maps
 * - sesskey / fsresourceid left in markup or inline script
 * - declared video duration and page title
 */

export type EmbeddedObject = Record<string, string>;

// key: 'value' | key: "value" | key: 123 | 'key': value, in object literal or JSON form
const PAIR_RE = /['"]?([A-Za-z_$][\w$]*)['"]?\s*:\s*(?:'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)"|([^,{}\s]+))/g;

// Pull the key/value pairs out of an object literal's source text.
// Nested objects are flattened into the same map; the first occurrence of a key wins.
export function parseObjectLiteral(source: string): EmbeddedObject {
  const out: EmbeddedObject = {};
  for (const m of source.matchAll(PAIR_RE)) {
    const key = m[1];
    if (Object.prototype.hasOwnProperty.call(out, key)) continue;
    const value = m[2] ?? m[3] ?? m[4] ?? '';
    out[key] = value.replace(/\\(.)/g, '$1');
  }
  return out;
}

function sliceBalanced(text: string, openIdx: number): string | null {
  let depth = 0;
  let quote: string | null = null;
  for (let i = openIdx; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(openIdx, i + 1);
    }
  }
  return null;
}

function findAssignedObject(html: string, pattern: RegExp): EmbeddedObject | null {
  const m = pattern.exec(html);
  if (!m) return null;
  const open = m.index + m[0].length - 1;
  const source = sliceBalanced(html, open);
  return source ? parseObjectLiteral(source) : null;
}

// Matches: var playerdata = {...}; or playerdata: {...}
export function extractPlayerData(html: string): EmbeddedObject | null {
  return findAssignedObject(html, /playerdata\s*[=:]\s*\{/);
}

export function extractMoodleCfg(html: string): EmbeddedObject | null {
  return findAssignedObject(html, /M\.cfg\s*=\s*\{/);
}

// hidden form field or data-sesskey attribute
export function extractInlineSesskey(html: string): string | null {
  const input = html.match(/name=["']sesskey["']\s+value=["']([a-zA-Z0-9]+)["']/);
  if (input) return input[1];
  const attr = html.match(/data-sesskey\s*=\s*["']([a-zA-Z0-9]+)["']/);
  return attr ? attr[1] : null;
}

export function extractInlineResourceId(html: string): number | null {
  const patterns = [
    /data-fsresourceid\s*=\s*"?(\d+)"?/,
    /fsresourceid["']?\s*[:=]\s*["']?(\d+)/,
    /fsresource\s*:\s*\{[^}]*?id\s*:\s*(\d+)/,
  ];
  for (const pat of patterns) {
    const m = html.match(pat);
    if (m) return Number(m[1]);
  }
  return null;
}

export function extractDeclaredDuration(html: string): number | null {
  const patterns = [/data-duration\s*=\s*"?(\d+)"?/, /duration["']?\s*[:=]\s*["']?(\d+)/];
  for (const pat of patterns) {
    const m = html.match(pat);
    if (m) return Number(m[1]);
  }
  return null;
}

export function extractTitle(html: string): string | null {
  const m = html.match(/<h2[^>]*>([\s\S]*?)<\/h2>/);
  if (!m) return null;
  const text = m[1].replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
  return text || null;
}

// sesskeys are plain alphanumerics; anything else is script text, not a key
export function toSesskey(value: string | null | undefined): string | null {
  const v = value?.trim();
  return v && /^[A-Za-z0-9]+$/.test(v) ? v : null;
}

// positive integer or null
export function toId(value: string | null | undefined): number | null {
  if (value == null || !/^\d+$/.test(value.trim())) return null;
  const n = Number(value.trim());
  return n > 0 ? n : null;
}
