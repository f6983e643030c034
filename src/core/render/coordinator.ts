// src/core/render/coordinator.ts
import { chromium } from 'playwright';
import { resolveRendererOptions } from '../config/renderer-config.js';
import { DEFAULT_VIEWPORT } from '../config/constants.js';
import { ErrorCode, RenderError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { classifyRenderFailure } from './classify.js';
import { installResourcePolicy } from './resource-policy.js';
import { Semaphore } from './semaphore.js';
import { RenderStatistics } from './statistics.js';
import { elapsedSeconds, isRenderableUrl, normalizeUrl } from './utils.js';
import type {
  BrowserLauncher,
  RenderBrowser,
  RenderContext,
  RenderPage,
  RenderResult,
  RenderStatisticsSnapshot,
  RendererOptions,
  ResolvedRendererOptions,
} from './types.js';

const log = logger.child('renderer');

interface Session {
  browser: RenderBrowser;
  gate: Semaphore;
}

/**
 * Renders batches of websites in isolated browser contexts with at most
 * `maxWorkers` navigations in flight. Every URL yields exactly one
 * {@link RenderResult}, in input order; per-URL failures are reported in the
 * result and never thrown.
 */
export class RenderCoordinator {
  readonly options: ResolvedRendererOptions;
  private readonly launcher: BrowserLauncher;
  private readonly statistics = new RenderStatistics();
  private session?: Session;
  private starting?: Promise<Session>;

  constructor(options: RendererOptions = {}, launcher: BrowserLauncher = chromium) {
    this.options = resolveRendererOptions(options);
    this.launcher = launcher;
  }

  isStarted(): boolean {
    return this.session !== undefined;
  }

  async start(): Promise<void> {
    if (this.session) {
      log.warn('Renderer already started, reusing the running browser');
      return;
    }
    if (this.starting) {
      log.warn('Renderer is already starting, waiting for the same browser');
      await this.starting;
      return;
    }

    log.info(`Starting renderer with ${this.options.maxWorkers} workers`);

    this.starting = this.launchSession();
    try {
      this.session = await this.starting;
    } finally {
      this.starting = undefined;
    }
    log.info('Browser launched');
  }

  async close(): Promise<void> {
    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        log.debug(`Pending launch failed during close: ${describeError(error)}`);
      }
    }

    const session = this.session;
    if (!session) {
      return;
    }

    log.info('Closing renderer');
    this.session = undefined;
    await session.browser.close();
    log.info('Renderer closed');
  }

  private async launchSession(): Promise<Session> {
    let browser: RenderBrowser;
    try {
      browser = await this.launcher.launch({
        headless: this.options.headless,
        args: [...this.options.launchArgs],
      });
    } catch (error) {
      throw new RenderError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to launch browser: ${describeError(error)}`,
        false,
        'Run `lead-render install-browsers` to install Chromium'
      );
    }
    return { browser, gate: new Semaphore(this.options.maxWorkers) };
  }

  /**
   * Renders every URL concurrently, bounded by the worker gate. Statistics
   * are updated once, after the whole batch has settled.
   */
  async renderMany(urls: ReadonlyArray<string | null | undefined>): Promise<RenderResult[]> {
    const input: unknown = urls;
    if (!Array.isArray(input)) {
      throw new RenderError(ErrorCode.INVALID_ARGUMENT, 'renderMany expects an array of URLs');
    }
    if (urls.length === 0) {
      return [];
    }
    this.requireSession();

    log.info(`Rendering ${urls.length} websites with ${this.options.maxWorkers} workers`);

    const settled = await Promise.allSettled(urls.map((url) => this.renderOne(url)));
    const results = settled.map((outcome, index): RenderResult => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      return {
        url: String(urls[index]),
        success: false,
        errorMessage: describeError(outcome.reason),
        errorType: 'execution_error',
      };
    });

    this.statistics.recordBatch(results);

    const succeeded = results.filter((result) => result.success).length;
    log.info(`Completed rendering: ${succeeded} successful, ${results.length - succeeded} failed`);

    return results;
  }

  /**
   * Renders a single URL through the same worker gate. Does not touch the
   * statistics; those follow {@link renderMany} batches.
   */
  async renderOne(url: string | null | undefined): Promise<RenderResult> {
    const session = this.requireSession();
    const startedAt = performance.now();

    if (!isRenderableUrl(url)) {
      return {
        url: String(url),
        success: false,
        errorMessage: 'Invalid URL provided',
        errorType: 'validation_error',
      };
    }

    const target = normalizeUrl(url);
    return session.gate.use(() => this.renderInContext(session.browser, target, startedAt));
  }

  getStatistics(): RenderStatisticsSnapshot {
    return this.statistics.snapshot();
  }

  resetStatistics(): void {
    this.statistics.reset();
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new RenderError(
        ErrorCode.NOT_STARTED,
        'Renderer not started - call start() or use withRenderCoordinator()',
        false,
        'Start the coordinator before rendering'
      );
    }
    return this.session;
  }

  private async renderInContext(browser: RenderBrowser, url: string, startedAt: number): Promise<RenderResult> {
    let context: RenderContext | undefined;
    let page: RenderPage | undefined;

    try {
      context = await browser.newContext({
        userAgent: this.options.userAgent,
        viewport: { ...DEFAULT_VIEWPORT },
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
      });
      page = await context.newPage();

      if (this.options.blockResources) {
        await installResourcePolicy(page, this.options.resourcePolicy);
      }

      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.timeoutSeconds * 1000,
      });
      const statusCode = response?.status();

      if (statusCode !== undefined && statusCode >= 400) {
        return {
          url,
          success: false,
          statusCode,
          finalUrl: page.url(),
          errorMessage: `HTTP ${statusCode}`,
          errorType: 'http_error',
          renderTimeSeconds: elapsedSeconds(startedAt),
        };
      }

      await this.settle(page);

      const htmlContent = await page.content();
      const title = await page.title();

      return {
        url,
        success: true,
        htmlContent,
        title,
        finalUrl: page.url(),
        statusCode,
        renderTimeSeconds: elapsedSeconds(startedAt),
      };
    } catch (error) {
      const failure = classifyRenderFailure(error, this.options.timeoutSeconds);
      log.debug(`${url} failed with ${failure.errorType}: ${failure.errorMessage}`);
      return {
        url,
        success: false,
        ...failure,
        renderTimeSeconds: elapsedSeconds(startedAt),
      };
    } finally {
      await this.teardown(url, page, context);
    }
  }

  private async settle(page: RenderPage): Promise<void> {
    if (this.options.settleDelayMs === 0) {
      return;
    }
    try {
      await page.waitForTimeout(this.options.settleDelayMs);
    } catch (error) {
      log.debug(`Settle wait interrupted: ${describeError(error)}`);
    }
  }

  // Teardown failures must not replace the real result or leak into other workers.
  private async teardown(url: string, page?: RenderPage, context?: RenderContext): Promise<void> {
    if (page) {
      try {
        await page.close();
      } catch (error) {
        log.debug(`Failed to close page for ${url}: ${describeError(error)}`);
      }
    }
    if (context) {
      try {
        await context.close();
      } catch (error) {
        log.debug(`Failed to close context for ${url}: ${describeError(error)}`);
      }
    }
  }
}

/**
 * Starts a coordinator, hands it to `fn`, and closes it on every exit path.
 */
export async function withRenderCoordinator<T>(
  options: RendererOptions,
  fn: (coordinator: RenderCoordinator) => Promise<T>,
  launcher?: BrowserLauncher
): Promise<T> {
  const coordinator = new RenderCoordinator(options, launcher);
  await coordinator.start();
  try {
    return await fn(coordinator);
  } finally {
    await coordinator.close();
  }
}

export async function renderUrls(
  urls: ReadonlyArray<string | null | undefined>,
  options: RendererOptions = {},
  launcher?: BrowserLauncher
): Promise<RenderResult[]> {
  return withRenderCoordinator(options, (coordinator) => coordinator.renderMany(urls), launcher);
}
