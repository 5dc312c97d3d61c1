/**
 * Script identifiers derived from job names.
 */

import { randomUUID } from 'node:crypto';

import slugify from '@sindresorhus/slugify';

// Symbols slugify would spell out in words collapse to a separator instead.
const SYMBOL_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['&', ' '],
  ['\u{1F984}', ' '],
  ['\u2665', ' '],
];

/** Slugify a job name into a script identifier; empty when nothing survives. */
export function slugifyName(name: string): string {
  return slugify(name.replace(/[~^]+/g, ''), {
    decamelize: false,
    customReplacements: SYMBOL_REPLACEMENTS,
  });
}

/** Generate a random script identifier. */
export function randomIdentifier(): string {
  return randomUUID();
}

/**
 * Resolve the script identifier for a job. Missing or unsluggable names and
 * names already taken get a random identifier instead.
 */
export function resolveIdentifier(
  name: string | null | undefined,
  taken: ReadonlySet<string>,
  generate: () => string = randomIdentifier,
): string {
  const slug = name ? slugifyName(name) : '';
  if (slug && !taken.has(slug)) return slug;

  let id = generate();
  while (taken.has(id)) id = generate();
  return id;
}
