// src/core/export/json.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { ErrorCode, RenderError, describeError } from '../errors.js';
import type { RenderResult, RenderStatisticsSnapshot } from '../render/types.js';
import type { ExportedResult, RenderReport } from './types.js';

/**
 * HTML is dropped unless asked for; its length is kept so consumers can
 * still tell empty pages apart.
 */
export function toExportedResult(result: RenderResult, includeHtml: boolean): ExportedResult {
  const { htmlContent, ...rest } = result;
  if (htmlContent === undefined) {
    return rest;
  }
  return includeHtml
    ? { ...rest, htmlContent, htmlLength: htmlContent.length }
    : { ...rest, htmlLength: htmlContent.length };
}

export function formatJsonlLine(result: RenderResult, includeHtml: boolean): string {
  return JSON.stringify(toExportedResult(result, includeHtml));
}

export function buildRenderReport(
  results: readonly RenderResult[],
  statistics: RenderStatisticsSnapshot,
  includeHtml: boolean,
  generatedAt: Date = new Date()
): RenderReport {
  return {
    generatedAt: generatedAt.toISOString(),
    statistics,
    results: results.map((result) => toExportedResult(result, includeHtml)),
  };
}

export async function writeRenderReport(report: RenderReport, filePath: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new RenderError(
      ErrorCode.OUTPUT_WRITE_FAILED,
      `Failed to write report to ${filePath}: ${describeError(error)}`,
      false,
      `Check permissions for: ${path.dirname(filePath)}`
    );
  }
}
