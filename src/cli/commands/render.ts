// src/cli/commands/render.ts
import { Command, InvalidArgumentError } from 'commander';
import { BatchRunner, type BatchSummary, type UrlSource } from '../../core/batch/runner.js';
import { loadRendererConfig } from '../../core/config/renderer-config.js';
import { isRenderError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { RendererOptions } from '../../core/render/types.js';

export interface RenderCommandOptions {
  file?: string;
  stdin?: boolean;
  workers?: number;
  timeout?: number;
  settle?: number;
  headful: boolean;
  blockResources: boolean;
  userAgent?: string;
  jsonl: boolean;
  includeHtml: boolean;
  report?: string;
  saveHtml?: string;
  failOnError: boolean;
  verbose: boolean;
  quiet: boolean;
}

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Environment supplies the base configuration; flags given on the command
 * line win over it.
 */
export function buildRendererOptions(base: RendererOptions, options: RenderCommandOptions): RendererOptions {
  const renderer: RendererOptions = { ...base };
  if (options.workers !== undefined) {
    renderer.maxWorkers = options.workers;
  }
  if (options.timeout !== undefined) {
    renderer.timeoutSeconds = options.timeout;
  }
  if (options.settle !== undefined) {
    renderer.settleDelayMs = options.settle;
  }
  if (options.headful) {
    renderer.headless = false;
  }
  if (!options.blockResources) {
    renderer.blockResources = false;
  }
  if (options.userAgent !== undefined) {
    renderer.userAgent = options.userAgent;
  }
  return renderer;
}

export function resolveSource(urls: string[], options: RenderCommandOptions): UrlSource | undefined {
  if (options.file) {
    return 'file';
  }
  if (options.stdin) {
    return 'stdin';
  }
  return urls.length > 0 ? 'args' : undefined;
}

export function registerRenderCommand(program: Command): void {
  program
    .argument('[urls...]', 'URLs to render (optional if using --file or --stdin)')
    .option('--file <path>', 'Read URLs from file, one per line')
    .option('--stdin', 'Read URLs from stdin')
    .option('-w, --workers <n>', 'Maximum concurrent renders', parseNumberOption)
    .option('-t, --timeout <seconds>', 'Navigation timeout in seconds', parseNumberOption)
    .option('--settle <ms>', 'Wait after DOMContentLoaded before reading the page', parseNumberOption)
    .option('--headful', 'Show the browser window', false)
    .option('--no-block-resources', 'Load images, stylesheets, fonts and media')
    .option('--user-agent <ua>', 'Override the browser user agent')
    .option('--jsonl', 'Print one JSON result per line to stdout', false)
    .option('--include-html', 'Include rendered HTML in JSONL and report output', false)
    .option('--report <file>', 'Write a JSON report with results and statistics')
    .option('--save-html <dir>', 'Save the HTML of successful renders into a directory')
    .option('--fail-on-error', 'Exit with code 1 when any URL fails', false)
    .option('--verbose', 'Verbose output', false)
    .option('--quiet', 'Only log errors', false)
    .action(async (urls: string[], options: RenderCommandOptions) => {
      const source = resolveSource(urls, options);
      if (!source) {
        console.error('Error: URL arguments or --file/--stdin is required');
        process.exit(1);
      }

      let summary: BatchSummary;
      try {
        const env = loadRendererConfig();
        if (env.logLevel) {
          logger.setLevel(env.logLevel);
        }
        if (options.verbose) {
          logger.setLevel('debug');
        } else if (options.quiet) {
          logger.setLevel('error');
        }

        summary = await new BatchRunner().run({
          source,
          urls,
          filePath: options.file,
          renderer: buildRendererOptions(env.renderer, options),
          jsonl: options.jsonl,
          includeHtml: options.includeHtml,
          reportPath: options.report,
          snapshotDir: options.saveHtml,
        });
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        if (isRenderError(error) && error.suggestion) {
          console.error(`Hint: ${error.suggestion}`);
        }
        process.exit(1);
      }

      if (options.failOnError && summary.failed > 0) {
        process.exit(1);
      }
    });
}
