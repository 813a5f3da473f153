/**
 * actionQueue.ts: Single-flight access to one browser page.
 *
 * A Puppeteer page handles one logical action at a time; two concurrent
 * `click()`s against it are undefined.  `serializePage` wraps a BrowserPage
 * so that every call goes through a Bottleneck limiter with
 * `maxConcurrent: 1`.  Page-changing actions (navigate, fill, click, press)
 * pass through a second limiter first, chained onto the queue, which spaces
 * them by the configured request delay.  Probes and reads only queue; they
 * are not paced.
 */

import Bottleneck from 'bottleneck';
import type { BrowserPage, Cookie, ElementRef, Locator, PressKey } from '../core/types';

export interface ActionQueueOptions {
  /** Minimum gap between page-changing actions. */
  requestDelayMs: number;
}

export interface SerializedPage extends BrowserPage {
  /** Stop both limiters.  Pending actions are dropped.  Safe to call twice. */
  stop(): Promise<void>;
}

export function serializePage(page: BrowserPage, options: ActionQueueOptions): SerializedPage {
  const queue = new Bottleneck({ maxConcurrent: 1 });
  const pacer = new Bottleneck({ maxConcurrent: 1, minTime: options.requestDelayMs });
  pacer.chain(queue);
  let stopped = false;

  return {
    navigate: (url: string, timeoutMs: number) => pacer.schedule(() => page.navigate(url, timeoutMs)),
    waitForSettle: (timeoutMs: number) => queue.schedule(() => page.waitForSettle(timeoutMs)),
    probe: (locator: Locator, timeoutMs: number) => queue.schedule(() => page.probe(locator, timeoutMs)),
    fill: (element: ElementRef, text: string) => pacer.schedule(() => page.fill(element, text)),
    click: (element: ElementRef) => pacer.schedule(() => page.click(element)),
    press: (element: ElementRef, key: PressKey) => pacer.schedule(() => page.press(element, key)),
    cookies: () => queue.schedule(() => page.cookies()),
    setCookies: (cookies: Cookie[]) => queue.schedule(() => page.setCookies(cookies)),
    currentUrl: () => page.currentUrl(),
    title: () => queue.schedule(() => page.title()),
    stop: async () => {
      // Bottleneck rejects a second stop().
      if (stopped) return;
      stopped = true;
      await pacer.stop({ dropWaitingJobs: true });
      await queue.stop({ dropWaitingJobs: true });
    },
  };
}
