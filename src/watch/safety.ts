/**
 * safety.ts
 *
 * Guardrail on every outgoing request so a bad template or base URL cannot
 * touch anything else on the account:
 * - only the configured Moodle origin is reachable
 * - GET is allowed (page reads)
 * - POST is allowed to /lib/ajax/service.php only
 * - anything else throws before it is sent
 */

export const SERVICE_PATH = '/lib/ajax/service.php';

export function assertAllowedRequest(baseUrl: string, method: string, url: string): void {
  const base = new URL(baseUrl);
  const target = new URL(url, base);

  if (target.origin !== base.origin) {
    throw new Error(`Blocked off-site call: ${method} ${target.toString()}`);
  }

  if (method === 'GET') return;

  if (method === 'POST' && target.pathname === SERVICE_PATH) return;

  throw new Error(`Blocked call outside the AJAX service: ${method} ${target.pathname}`);
}
