/**
 * Link Discovery Service
 *
 * Opens the open-data page in headless Chrome, picks the requested year in the
 * page's year dropdown and collects the ftps:// links the page then lists.
 * The browser lives only for the duration of one discover() call.
 */

import puppeteer, { Browser } from 'puppeteer-core';
import * as cheerio from 'cheerio';
import { ConfigurationError, describeError, ExternalToolError } from '../types/errors';
import { Logger, LogSink } from '../utils/logger';

export const YEAR_SELECT_SELECTOR = '#root select';

export interface LinkDiscoveryOptions {
  sourceUrl: string;
  chromePath?: string;
  /** Wait after selecting the year, for the link list to re-render */
  settleMs: number;
  navigationTimeoutMs: number;
}

export interface LinkSource {
  discover(year: string): Promise<string[]>;
}

/**
 * Every distinct ftps:// href on the page, in page order
 */
export function extractFtpsLinks(html: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $('a[href]').each((_index, element) => {
    const href = ($(element).attr('href') || '').trim();
    if (href.startsWith('ftps://') && !links.includes(href)) {
      links.push(href);
    }
  });

  return links;
}

export class LinkDiscoveryService implements LinkSource {
  private options: LinkDiscoveryOptions;
  private logger: LogSink;

  constructor(options: LinkDiscoveryOptions, logger: LogSink = new Logger('LinkDiscovery')) {
    this.options = options;
    this.logger = logger;
  }

  async discover(year: string): Promise<string[]> {
    const html = await this.withBrowser(browser => this.loadYearPage(browser, year));

    const links = extractFtpsLinks(html);
    if (links.length === 0) {
      throw new ExternalToolError('browser', `No FTPS links found for year ${year} at ${this.options.sourceUrl}`);
    }

    this.logger.info(`Found ${links.length} FTPS links`);
    for (const link of links) {
      this.logger.info(`Link: ${link}`);
    }
    return links;
  }

  private async loadYearPage(browser: Browser, year: string): Promise<string> {
    const { sourceUrl, settleMs, navigationTimeoutMs } = this.options;
    const page = await browser.newPage();
    await page.setViewport({ width: 1920, height: 1080 });

    this.logger.info(`Opening ${sourceUrl}`);
    try {
      await page.goto(sourceUrl, { waitUntil: 'networkidle2', timeout: navigationTimeoutMs });
    } catch (error) {
      throw new ExternalToolError('browser', `Failed to open ${sourceUrl}: ${describeError(error)}`);
    }

    try {
      await page.waitForSelector(YEAR_SELECT_SELECTOR, { timeout: navigationTimeoutMs });
    } catch (error) {
      throw new ExternalToolError(
        'browser',
        `Page structure unrecognized: no year dropdown (${YEAR_SELECT_SELECTOR}) at ${sourceUrl}: ${describeError(error)}`
      );
    }

    const selected = await page.select(YEAR_SELECT_SELECTOR, year);
    if (!selected.includes(year)) {
      throw new ExternalToolError('browser', `Year ${year} is not offered by ${sourceUrl}`);
    }
    this.logger.info(`Selected year: ${year}`);

    await new Promise(resolve => setTimeout(resolve, settleMs));
    return page.content();
  }

  /**
   * Launch a browser, run `work` with it and close it on every exit path
   */
  private async withBrowser<T>(work: (browser: Browser) => Promise<T>): Promise<T> {
    if (!this.options.chromePath) {
      throw new ConfigurationError('CHROME_PATH is not set; point it at a Chrome or Chromium executable');
    }

    this.logger.info('Launching browser...');
    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        executablePath: this.options.chromePath,
        headless: true,
        // Ctrl-C or a kill still takes the browser down with the process
        handleSIGINT: true,
        handleSIGTERM: true,
        handleSIGHUP: true,
        args: ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage', '--window-size=1920,1080'],
      });
    } catch (error) {
      throw new ExternalToolError('browser', `Failed to launch browser: ${describeError(error)}`);
    }

    try {
      return await work(browser);
    } finally {
      await this.closeBrowser(browser);
    }
  }

  // A failed close is logged; whatever `work` threw or returned stands
  private async closeBrowser(browser: Browser): Promise<void> {
    try {
      await browser.close();
      this.logger.debug('Browser closed');
    } catch (error) {
      this.logger.error('Failed to close browser', error);
    }
  }
}
