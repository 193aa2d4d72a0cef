/**
 * Lightweight logger utility with emoji-prefixed action categories and timing.
 *
 * Usage:
 *   logger.api('fetch', 'Fetching record 12345...')
 *   // → 🌐 [fetch] Fetching record 12345...
 *
 *   logger.time('pipeline', 'fetch')
 *   // ... work ...
 *   logger.timeEnd('pipeline', 'fetch')
 *   // → ⏱️ [pipeline] fetch: 3.2s
 */

const ICONS = {
  api: '🌐',
  cache: '📦',
  graph: '🕸️',
  data: '📋',
  export: '💾',
  auth: '🔑',
  http: '📡',
  ok: '✅',
  warn: '⚠️',
  error: '❌',
  start: '▶️',
  done: '✔️',
  skip: '⏭️',
  time: '⏱️',
} as const;

type Icon = keyof typeof ICONS;

const timers = new Map<string, number>();

function log(icon: string, ctx: string, msg: string): void {
  console.log(`${icon} [${ctx}] ${msg}`);
}

function logWarn(icon: string, ctx: string, msg: string): void {
  console.warn(`${icon} [${ctx}] ${msg}`);
}

function logError(icon: string, ctx: string, msg: string): void {
  console.error(`${icon} [${ctx}] ${msg}`);
}

function makeLogger(icon: Icon) {
  const emoji = ICONS[icon];
  if (icon === 'error') return (ctx: string, msg: string) => logError(emoji, ctx, msg);
  if (icon === 'warn') return (ctx: string, msg: string) => logWarn(emoji, ctx, msg);
  return (ctx: string, msg: string) => log(emoji, ctx, msg);
}

/**
 * Format a duration in milliseconds as `850ms` or `3.2s`
 */
export function formatElapsed(elapsed: number): string {
  return elapsed >= 1000
    ? `${(elapsed / 1000).toFixed(1)}s`
    : `${Math.round(elapsed)}ms`;
}

export const logger = {
  api: makeLogger('api'),
  cache: makeLogger('cache'),
  graph: makeLogger('graph'),
  data: makeLogger('data'),
  export: makeLogger('export'),
  auth: makeLogger('auth'),
  http: makeLogger('http'),
  ok: makeLogger('ok'),
  warn: makeLogger('warn'),
  error: makeLogger('error'),
  start: makeLogger('start'),
  done: makeLogger('done'),
  skip: makeLogger('skip'),

  time(ctx: string, label: string): void {
    timers.set(`${ctx}:${label}`, performance.now());
  },

  timeEnd(ctx: string, label: string): void {
    const key = `${ctx}:${label}`;
    const start = timers.get(key);
    if (start === undefined) {
      log(ICONS.time, ctx, `${label}: no timer found`);
      return;
    }
    timers.delete(key);
    log(ICONS.time, ctx, `${label}: ${formatElapsed(performance.now() - start)}`);
  },
};
