import { serializePage } from '../src/middleware/actionQueue';
import type { SerializedPage } from '../src/middleware/actionQueue';
import { TransportError } from '../src/core/errors';
import type { ElementRef, Locator } from '../src/core/types';
import { FakePage } from './mocks/fake-page';

const BUTTON: Locator = { kind: 'css', selector: '#go' };
const REF: ElementRef = { id: 1, locator: BUTTON };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Records how many calls are inside the page at once, and when clicks start. */
class TrackingPage extends FakePage {
  active = 0;
  maxActive = 0;
  readonly clickStarts: number[] = [];

  private async track<T>(work: () => Promise<T>): Promise<T> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await delay(15);
      return await work();
    } finally {
      this.active--;
    }
  }

  probe(locator: Locator, timeoutMs: number): Promise<ElementRef | null> {
    return this.track(() => super.probe(locator, timeoutMs));
  }

  /** Records without the ref check: these tests click one fixed ref. */
  click(element: ElementRef): Promise<void> {
    this.clickStarts.push(Date.now());
    return this.track(async () => {
      if (this.failures.click) throw this.failures.click;
      this.clicks.push(element.locator);
    });
  }
}

describe('serializePage', () => {
  let page: TrackingPage;
  let serialized: SerializedPage;

  afterEach(async () => {
    await serialized.stop();
  });

  it('never lets two calls into the page at once', async () => {
    page = new TrackingPage();
    serialized = serializePage(page, { requestDelayMs: 0 });

    await Promise.all([
      serialized.probe(BUTTON, 100),
      serialized.click(REF),
      serialized.probe(BUTTON, 100),
      serialized.click(REF),
    ]);

    expect(page.maxActive).toBe(1);
    expect(page.probes).toHaveLength(2);
    expect(page.clicks).toHaveLength(2);
  });

  it('spaces page-changing actions by the request delay', async () => {
    page = new TrackingPage();
    serialized = serializePage(page, { requestDelayMs: 60 });

    await Promise.all([serialized.click(REF), serialized.click(REF)]);

    const [first, second] = page.clickStarts;
    expect(second - first).toBeGreaterThanOrEqual(50);
  });

  it('passes results and errors through', async () => {
    page = new TrackingPage().show(BUTTON);
    serialized = serializePage(page, { requestDelayMs: 0 });

    await expect(serialized.probe(BUTTON, 100)).resolves.toEqual({ id: 1, locator: BUTTON });

    page.failures.click = new TransportError('Target closed');
    await expect(serialized.click(REF)).rejects.toThrow('Target closed');
  });

  it('reads the current URL without queueing', () => {
    page = new TrackingPage('https://portal.test/home');
    serialized = serializePage(page, { requestDelayMs: 0 });

    expect(serialized.currentUrl()).toBe('https://portal.test/home');
  });

  it('can be stopped twice', async () => {
    page = new TrackingPage();
    serialized = serializePage(page, { requestDelayMs: 0 });

    await serialized.stop();
    await expect(serialized.stop()).resolves.toBeUndefined();
  });
});
