/**
 * Schedule expression resolver. Turns shortcuts and `@random` placeholders into
 * plain 5-field cron expressions; everything else passes through.
 */

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;

/** Fixed expansions for the cron shortcuts. */
export const SCHEDULE_SHORTCUTS: ReadonlyMap<string, string> = new Map([
  ['@yearly', '0 0 1 1 *'],
  ['@annually', '0 0 1 1 *'],
  ['@monthly', '0 0 1 * *'],
  ['@weekly', '0 0 * * 0'],
  ['@daily', '0 0 * * *'],
  ['@midnight', '0 0 * * *'],
  ['@hourly', '0 * * * *'],
]);

/** Draw an integer in [min, max]. */
function draw(random: RandomSource, min: number, max: number): string {
  return String(min + Math.floor(random() * (max - min + 1)));
}

/**
 * Resolve a schedule string to a 5-field cron expression.
 *
 * `@random` draws each requested field (`@m`, `@h`, `@d`) exactly once, so the
 * returned expression is fixed for the life of whatever holds it.
 */
export function resolveSchedule(
  raw: string,
  random: RandomSource = Math.random,
): string {
  const tokens = raw.trim().split(/\s+/);
  const [head, ...rest] = tokens;

  const shortcut = SCHEDULE_SHORTCUTS.get(head);
  if (shortcut) return shortcut;

  if (head === '@random') {
    let minute = '*';
    let hour = '*';
    let weekday = '*';

    for (const token of rest) {
      switch (token) {
        case '@m':
          minute = draw(random, 0, 59);
          break;
        case '@h':
          hour = draw(random, 0, 23);
          break;
        case '@d':
          weekday = draw(random, 0, 6);
          break;
      }
    }

    return `${minute} ${hour} * * ${weekday}`;
  }

  return tokens.join(' ');
}
