/**
 * CatalogSurface over a puppeteer-core browser session.
 * All DOM knowledge (selectors, button texts) lives here and in the
 * browser.selectors config section.
 */

import puppeteer, { ProtocolError, TimeoutError } from 'puppeteer-core';
import type { Browser, ElementHandle, Page } from 'puppeteer-core';

import type { CatalogSettings, SelectorConfig } from '../shared/config.js';
import { errorMessage, SurfaceFaultError, SurfaceMissError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { type LibraryStats, type LibraryStatsSource, parseLibraryStats } from './library.js';
import type { ActionScope, CatalogSurface, ResultCandidate } from './types.js';

const log = createLogger('browser');

const SHOW_MORE_SETTLE_MS = 500;
const QUERY_INPUT_TIMEOUT_MS = 5_000;
const SETTINGS_TIMEOUT_MS = 3_000;
const LIBRARY_TIMEOUT_MS = 10_000;

export interface PuppeteerSurfaceOptions {
  executablePath: string;
  headless: boolean;
  catalogBaseUrl: string;
  storage: Record<string, string>;
  navigationTimeoutMs: number;
  selectors: SelectorConfig;
  settings?: CatalogSettings;
}

const TRANSIENT = /not clickable|not visible|detached from document|no element found|failed to find|not an HTMLElement/i;
const FATAL = /target closed|session closed|browser has disconnected|protocol error|execution context was destroyed/i;

/** Map a puppeteer error onto the engine's miss / fault split. */
export function toSurfaceError(err: unknown, what: string): Error {
  if (err instanceof SurfaceMissError || err instanceof SurfaceFaultError) return err;
  const message = `${what}: ${errorMessage(err)}`;
  if (err instanceof TimeoutError) return new SurfaceMissError(message, { cause: err });
  if (err instanceof ProtocolError || FATAL.test(errorMessage(err))) return new SurfaceFaultError(message, { cause: err });
  if (TRANSIENT.test(errorMessage(err))) return new SurfaceMissError(message, { cause: err });
  return new SurfaceFaultError(message, { cause: err });
}

const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class PuppeteerSurface implements CatalogSurface, LibraryStatsSource {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly opts: PuppeteerSurfaceOptions) {}

  async open(): Promise<void> {
    if (!this.opts.executablePath) {
      throw new SurfaceFaultError('browser.executablePath is not set; point it at a Chrome or Chromium binary');
    }
    this.browser = await puppeteer.launch({
      executablePath: this.opts.executablePath,
      headless: this.opts.headless,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    });
    this.page = await this.browser.newPage();
    this.page.setDefaultNavigationTimeout(this.opts.navigationTimeoutMs);

    const entries = Object.entries(this.opts.storage);
    if (entries.length > 0) {
      await this.page.goto(this.opts.catalogBaseUrl, { waitUntil: 'domcontentloaded' });
      await this.page.evaluate((pairs: Array<[string, string]>) => {
        for (const [key, value] of pairs) localStorage.setItem(key, value);
      }, entries);
      log.debug(`seeded ${entries.length} storage entries`);
    }
    await this.applySettings(this.page);
    log.info('browser session opened');
  }

  /** Best effort: a settings page that does not load leaves the catalog defaults. */
  private async applySettings(page: Page): Promise<void> {
    const { maxMovieSize, maxEpisodeSize, torrentFilter } = this.opts.settings ?? {};
    if (!maxMovieSize && !maxEpisodeSize && !torrentFilter) return;
    const sel = this.opts.selectors;
    const base = this.opts.catalogBaseUrl.replace(/\/$/, '');

    try {
      await page.goto(`${base}/settings`, { waitUntil: 'domcontentloaded' });
      const selects: Array<[string, string | undefined, string]> = [
        [sel.settingsMovieMaxSize, maxMovieSize, 'max movie size'],
        [sel.settingsEpisodeMaxSize, maxEpisodeSize, 'max episode size'],
      ];
      for (const [selector, value, what] of selects) {
        if (!value) continue;
        await page.waitForSelector(selector, { visible: true, timeout: SETTINGS_TIMEOUT_MS });
        const picked = await page.select(selector, value);
        if (picked.length === 0) log.warn(`catalog has no ${what} option "${value}"`);
        else log.info(`${what} set to ${value} GB`);
      }
      if (torrentFilter) {
        const input = await page.waitForSelector(sel.settingsTorrentFilter, { timeout: SETTINGS_TIMEOUT_MS });
        if (input) {
          await input.evaluate((el) => {
            if (el instanceof HTMLInputElement) el.value = '';
          });
          await input.type(torrentFilter);
          log.info(`default torrent filter set to ${torrentFilter}`);
        }
      }
    } catch (err) {
      log.warn(`could not apply catalog settings: ${errorMessage(err)}`);
    }
  }

  /** Reads the library page heading. Leaves the page on the library view. */
  async libraryStats(): Promise<LibraryStats | null> {
    if (!(await this.isUsable())) return null;
    const sel = this.opts.selectors;
    const base = this.opts.catalogBaseUrl.replace(/\/$/, '');
    return this.run('library stats', async (page) => {
      await page.goto(`${base}/library`, { waitUntil: 'load', timeout: this.opts.navigationTimeoutMs });
      const handle = await page.waitForFunction(
        (heading: string) => {
          const el = Array.from(document.querySelectorAll(heading)).find((h) => (h.textContent ?? '').includes('Library'));
          return el ? (el.textContent ?? '').trim() : false;
        },
        { timeout: LIBRARY_TIMEOUT_MS },
        sel.libraryHeading,
      );
      const text = await handle.jsonValue();
      return typeof text === 'string' ? parseLibraryStats(text) : null;
    });
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (browser) await browser.close();
  }

  /** Drop the current session and open a new one. */
  async relaunch(): Promise<boolean> {
    try {
      await this.close();
    } catch (err) {
      log.debug(`closing stale browser failed: ${errorMessage(err)}`);
    }
    try {
      await this.open();
      return true;
    } catch (err) {
      log.error(`relaunching browser failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async isUsable(): Promise<boolean> {
    return Boolean(this.browser?.connected && this.page && !this.page.isClosed());
  }

  private requirePage(): Page {
    if (!this.page || this.page.isClosed()) throw new SurfaceFaultError('no open catalog page');
    return this.page;
  }

  private async run<T>(what: string, fn: (page: Page) => Promise<T>): Promise<T> {
    const page = this.requirePage();
    try {
      return await fn(page);
    } catch (err) {
      throw toSurfaceError(err, what);
    }
  }

  async navigate(url: string): Promise<void> {
    await this.run(`navigate ${url}`, async (page) => {
      await page.goto(url, { waitUntil: 'load', timeout: this.opts.navigationTimeoutMs });
    });
  }

  async submitQuery(text: string): Promise<void> {
    const sel = this.opts.selectors;
    await this.run(`query "${text}"`, async (page) => {
      const input = await page.waitForSelector(sel.queryInput, { timeout: QUERY_INPUT_TIMEOUT_MS, visible: true });
      if (!input) throw new SurfaceMissError(`query input ${sel.queryInput} not found`);
      await input.evaluate((el) => {
        if (el instanceof HTMLInputElement) el.value = '';
      });
      if (text) await input.type(text);
      await page.keyboard.press('Enter');
      await this.expandResults(page);
    });
  }

  private async expandResults(page: Page): Promise<void> {
    const sel = this.opts.selectors;
    for (let i = 0; i < sel.showMoreLimit; i++) {
      const clicked = await page.evaluate((label: string) => {
        const button = Array.from(document.querySelectorAll('button')).find((b) => (b.textContent ?? '').includes(label));
        if (!button) return false;
        button.click();
        return true;
      }, sel.showMoreText);
      if (!clicked) break;
      await delay(SHOW_MORE_SETTLE_MS);
    }
  }

  async hasQualifyingIndicator(timeoutMs: number): Promise<boolean> {
    const sel = this.opts.selectors;
    return this.run('cached indicator', async (page) => {
      try {
        await page.waitForFunction(
          (marker: string, text: string) =>
            Array.from(document.querySelectorAll(marker)).some((b) => {
              const label = b.textContent ?? '';
              return label.includes(text) && !label.includes('Report');
            }),
          { timeout: timeoutMs },
          sel.cachedMarker,
          sel.cachedMarkerText,
        );
        return true;
      } catch (err) {
        if (err instanceof TimeoutError) return false;
        throw err;
      }
    });
  }

  async listResultCandidates(): Promise<ResultCandidate[]> {
    const sel = this.opts.selectors;
    const controls = [...new Set([...sel.actionControls['whole-season'], ...sel.actionControls['single-unit']])];
    return this.run('list results', (page) =>
      page.evaluate(
        (s: { box: string; title: string; label: string; marker: string; markerText: string; controls: string[]; controlText: string }) =>
          Array.from(document.querySelectorAll(s.box)).map((box, index) => {
            const text = (el: Element) => (el.textContent ?? '').trim();
            const visible = (el: Element) => el instanceof HTMLElement && el.offsetParent !== null;
            const titleEl = box.querySelector(s.title);
            const actionEls = [
              ...s.controls.flatMap((c) => Array.from(box.querySelectorAll(c))),
              ...Array.from(box.querySelectorAll('button')).filter((b) => text(b).includes(s.controlText)),
            ];
            return {
              index,
              displayText: titleEl ? text(titleEl) : '',
              labels: Array.from(box.querySelectorAll(s.label)).map(text).filter(Boolean),
              fullyAvailable: Array.from(box.querySelectorAll(s.marker)).some(
                (b) => text(b).includes(s.markerText) && !text(b).includes('Report'),
              ),
              actionable: actionEls.some(visible),
            };
          }),
        {
          box: sel.resultBox,
          title: sel.resultTitle,
          label: sel.resultLabel,
          marker: sel.cachedMarker,
          markerText: sel.cachedMarkerText,
          controls,
          controlText: sel.actionControlText,
        },
      ),
    );
  }

  private async findControl(box: ElementHandle<Element>, scope: ActionScope): Promise<ElementHandle<Element> | null> {
    const sel = this.opts.selectors;
    for (const selector of [...sel.actionControls[scope], `::-p-text(${sel.actionControlText})`]) {
      const handle = await box.$(selector);
      if (handle && (await handle.isVisible())) return handle;
    }
    return null;
  }

  async clickActionControl(index: number, scope: ActionScope, timeoutMs: number): Promise<boolean> {
    const sel = this.opts.selectors;
    return this.run(`action control #${index}`, async (page) => {
      const boxes = await page.$$(sel.resultBox);
      const box = boxes[index];
      if (!box) throw new SurfaceMissError(`result #${index} is no longer on the page`);

      const control = await this.findControl(box, scope);
      if (!control) return false;

      const before = await control.evaluate((el) => el.className);
      await control.click();
      try {
        await page.waitForFunction(
          (el: Element, previous: string) => !el.isConnected || el.className !== previous,
          { timeout: timeoutMs },
          control,
          before,
        );
      } catch (err) {
        if (err instanceof TimeoutError) return false;
        throw err;
      }

      // An empty torrent shows up as 0%; remove it again and report no fetch.
      const empty = await box.$('::-p-text("RD (0%)")');
      if (empty) {
        log.debug(`result #${index} fetched at 0%; undoing`);
        await empty.click();
        return false;
      }
      return true;
    });
  }

  async enablePackagingFilter(): Promise<boolean> {
    const sel = this.opts.selectors;
    return this.run('packaging filter', (page) =>
      page.evaluate((label: string) => {
        const toggle = Array.from(document.querySelectorAll('button, label, span')).find(
          (el) => (el.textContent ?? '').trim() === label,
        );
        if (!(toggle instanceof HTMLElement)) return false;
        if (toggle.getAttribute('aria-pressed') !== 'true') toggle.click();
        return true;
      }, sel.packagingFilterText),
    );
  }
}
