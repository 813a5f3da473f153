/**
 * candidateResolver.ts: Ordered fallback element resolution.
 *
 * Markup on the target site is neither versioned nor ours, so every element
 * the controller needs is described by a list of locators, most specific
 * first.  `resolveCandidates` probes them in order, each with its own
 * timeout, and stops at the first hit.
 *
 * The probe is read-only.  Filling or clicking the element is a separate
 * step owned by the caller.
 */

import type { BrowserPage, CandidateList, ElementRef, Locator } from '../core/types';
import { describeLocator } from '../core/locators';
import { Logger } from '../core/logger';

const logger = new Logger('CandidateResolver');

export type Resolution =
  | { found: true; element: ElementRef; locator: Locator; attempts: number }
  | { found: false; attempts: number };

/**
 * Try each candidate in order.  Worst-case latency is
 * `candidates.length * perCandidateTimeoutMs`.
 *
 * A TransportError thrown by the page propagates: an engine failure is not
 * the same thing as "no such element".
 */
export async function resolveCandidates(
  page: BrowserPage,
  candidates: CandidateList,
  perCandidateTimeoutMs: number,
): Promise<Resolution> {
  let attempts = 0;

  for (const locator of candidates) {
    attempts++;
    const element = await page.probe(locator, perCandidateTimeoutMs);
    if (element) {
      logger.debug('Candidate matched', {
        event: 'resolve.hit',
        locator: describeLocator(locator),
        attempt: attempts,
      });
      return { found: true, element, locator, attempts };
    }
    logger.debug('Candidate missed', {
      event: 'resolve.miss',
      locator: describeLocator(locator),
      attempt: attempts,
    });
  }

  return { found: false, attempts };
}
