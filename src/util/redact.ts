import os from 'node:os';

/**
 * Redaction utilities for logs. Masks the user's home directory in model and
 * jar paths. Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function homePattern(home: string): RegExp | null {
  if (!home || home === '/' || home === '\\') return null;
  return new RegExp(escapeRegExp(home), 'g');
}

export function scrubString(input: string, home: string = os.homedir()): string {
  const pattern = homePattern(home);
  return pattern ? input.replace(pattern, '~') : input;
}

function scrubDeep(value: unknown, home: string, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value, home);
  if (typeof value !== 'object' || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, home, seen));
  }
  if (value instanceof Error) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, home, seen);
  }
  return out;
}

/**
 * Scrub home-directory paths from a log argument.
 */
export function scrubPaths(arg: unknown, enabled: boolean, home: string = os.homedir()): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg, home);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean, home: string = os.homedir()): string {
  return enabled ? scrubString(msg, home) : msg;
}
