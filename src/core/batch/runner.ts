// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { withRenderCoordinator } from '../render/coordinator.js';
import { ErrorCode, RenderError, describeError } from '../errors.js';
import { buildRenderReport, formatJsonlLine, writeRenderReport } from '../export/json.js';
import { writeHtmlSnapshots } from '../export/snapshot.js';
import type { BrowserLauncher, RenderErrorType, RenderResult, RendererOptions } from '../render/types.js';

// Helper function to read from stdin (extracted for testability)
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export type UrlSource = 'args' | 'file' | 'stdin';

export interface BatchOptions {
  source: UrlSource;
  urls?: string[];
  filePath?: string;
  renderer: RendererOptions;
  jsonl: boolean;
  includeHtml?: boolean;
  reportPath?: string;
  snapshotDir?: string;
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  duration: number;
  errorBreakdown: Partial<Record<RenderErrorType, number>>;
  failures: Array<{ url: string; errorType?: RenderErrorType; error: string }>;
}

export class BatchRunner {
  constructor(private readonly launcher?: BrowserLauncher) {}

  async run(options: BatchOptions): Promise<BatchSummary> {
    const urls = await this.collectUrls(options);

    if (urls.length === 0) {
      return {
        total: 0,
        success: 0,
        failed: 0,
        duration: 0,
        errorBreakdown: {},
        failures: [],
      };
    }

    const startTime = Date.now();

    const { results, statistics } = await withRenderCoordinator(
      options.renderer,
      async (coordinator) => {
        const rendered = await coordinator.renderMany(urls);
        return { results: rendered, statistics: coordinator.getStatistics() };
      },
      this.launcher
    );

    for (const result of results) {
      this.printResult(result);
      if (options.jsonl) {
        console.log(formatJsonlLine(result, options.includeHtml ?? false));
      }
    }

    if (options.reportPath) {
      await writeRenderReport(
        buildRenderReport(results, statistics, options.includeHtml ?? false),
        options.reportPath
      );
      console.error(`[INFO] Report written to ${options.reportPath}`);
    }

    if (options.snapshotDir) {
      const written = await writeHtmlSnapshots(results, options.snapshotDir);
      console.error(`[INFO] Saved ${written.length} HTML snapshots to ${options.snapshotDir}`);
    }

    const summary = this.summarize(results, Date.now() - startTime);
    this.printSummary(summary);
    return summary;
  }

  async collectUrls(options: BatchOptions): Promise<string[]> {
    if (options.source === 'args') {
      return (options.urls ?? []).map((url) => url.trim()).filter((url) => url.length > 0);
    }
    return this.parseUrls(options.source, options.filePath);
  }

  async parseUrls(source: 'file' | 'stdin', filePath?: string): Promise<string[]> {
    let content: string;

    if (source === 'file') {
      if (!filePath) {
        throw new RenderError(
          ErrorCode.INVALID_ARGUMENT,
          'File path is required when source is "file"'
        );
      }
      try {
        content = await readFile(filePath, 'utf-8');
      } catch (error) {
        throw new RenderError(
          ErrorCode.INPUT_READ_FAILED,
          `Failed to read URL list ${filePath}: ${describeError(error)}`,
          false,
          'Check that the file exists and is readable'
        );
      }
    } else {
      content = await readStdin();
    }

    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  summarize(results: readonly RenderResult[], duration: number): BatchSummary {
    const errorBreakdown: Partial<Record<RenderErrorType, number>> = {};
    const failures: BatchSummary['failures'] = [];

    for (const result of results) {
      if (result.success) {
        continue;
      }
      if (result.errorType) {
        errorBreakdown[result.errorType] = (errorBreakdown[result.errorType] ?? 0) + 1;
      }
      failures.push({
        url: result.url,
        errorType: result.errorType,
        error: result.errorMessage ?? 'Unknown error',
      });
    }

    return {
      total: results.length,
      success: results.length - failures.length,
      failed: failures.length,
      duration,
      errorBreakdown,
      failures,
    };
  }

  private printResult(result: RenderResult): void {
    if (result.success) {
      const title = result.title ? ` (${result.title})` : '';
      console.error(`✓ ${result.url}${title}`);
    } else {
      console.error(`✗ ${result.url} (${result.errorType ?? 'unknown'})`);
    }
  }

  private printSummary(summary: BatchSummary): void {
    console.error('\n' + '━'.repeat(50));
    console.error(
      `Summary: ${summary.success} success, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    const breakdown = Object.entries(summary.errorBreakdown);
    if (breakdown.length > 0) {
      console.error(`Errors: ${breakdown.map(([type, count]) => `${type}=${count}`).join(', ')}`);
    }

    if (summary.failures.length > 0) {
      console.error('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        console.error(`  - ${url}: ${error}`);
      });
    }
  }
}
