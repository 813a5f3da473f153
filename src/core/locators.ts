/**
 * locators.ts: Locator schema, selector translation and key templating.
 *
 * Locators are plain data (they come from YAML and from `locators.json`);
 * this module turns them into Puppeteer selector strings.  Text and role
 * rules use Puppeteer's `::-p-text()` / `::-p-aria()` pseudo-elements, so
 * nothing here needs page-side JavaScript.
 */

import { z } from 'zod';
import type { CandidateList, Locator } from './types';
import defaults from './locators.json';

// ─── Schema ────────────────────────────────────────────────

const nonEmpty = z.string().min(1);

export const locatorSchema: z.ZodType<Locator> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('css'), selector: nonEmpty }),
  z.object({ kind: z.literal('text'), text: nonEmpty, tag: nonEmpty.optional() }),
  z.object({
    kind: z.literal('attribute'),
    attribute: nonEmpty,
    value: nonEmpty,
    match: z.enum(['exact', 'contains', 'prefix']).optional(),
    tag: nonEmpty.optional(),
  }),
  z.object({ kind: z.literal('role'), role: nonEmpty, name: nonEmpty.optional() }),
]);

export const candidateListSchema = z.array(locatorSchema);

export const locatorSetSchema = z.object({
  identifier: candidateListSchema.min(1),
  secret: candidateListSchema.min(1),
  submit: candidateListSchema.min(1),
  loggedInMarkers: candidateListSchema,
  searchSurface: candidateListSchema.min(1),
  searchInput: candidateListSchema.min(1),
  searchSubmit: candidateListSchema,
  result: candidateListSchema.min(1),
});

export type LocatorSet = z.infer<typeof locatorSetSchema>;

/** The built-in candidate lists, validated once at module load. */
export const DEFAULT_LOCATORS: LocatorSet = locatorSetSchema.parse(defaults);

// ─── Translation ───────────────────────────────────────────

const ATTRIBUTE_OPERATORS = {
  exact: '=',
  contains: '*=',
  prefix: '^=',
} as const;

/** CSS string literal.  JSON escaping is a valid subset of CSS escaping. */
function quote(value: string): string {
  return JSON.stringify(value);
}

/** Turn a Locator into a selector string understood by `page.waitForSelector`. */
export function toSelector(locator: Locator): string {
  switch (locator.kind) {
    case 'css':
      return locator.selector;
    case 'text':
      return `${locator.tag ?? ''}::-p-text(${quote(locator.text)})`;
    case 'attribute': {
      const op = ATTRIBUTE_OPERATORS[locator.match ?? 'exact'];
      return `${locator.tag ?? ''}[${locator.attribute}${op}${quote(locator.value)}]`;
    }
    case 'role': {
      const name = locator.name === undefined ? '' : `[name=${quote(locator.name)}]`;
      return `::-p-aria(${name}[role=${quote(locator.role)}])`;
    }
  }
}

/** Short form for log lines. */
export function describeLocator(locator: Locator): string {
  return `${locator.kind}:${toSelector(locator)}`;
}

// ─── Templating ────────────────────────────────────────────

const KEY_PLACEHOLDER = /\{key\}/g;

/**
 * Substitute `{key}` in the value-carrying fields of each locator.
 * CSS selectors are left untouched: the key only ever lands inside a
 * quoted value, never in raw selector syntax.
 */
export function withKey(candidates: CandidateList, key: string): Locator[] {
  const fill = (value: string): string => value.replace(KEY_PLACEHOLDER, () => key);

  return candidates.map((locator): Locator => {
    switch (locator.kind) {
      case 'css':
        return locator;
      case 'text':
        return { ...locator, text: fill(locator.text) };
      case 'attribute':
        return { ...locator, value: fill(locator.value) };
      case 'role':
        return locator.name === undefined ? locator : { ...locator, name: fill(locator.name) };
    }
  });
}
