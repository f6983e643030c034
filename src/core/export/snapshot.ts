// src/core/export/snapshot.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { ErrorCode, RenderError, describeError } from '../errors.js';
import { hostnameOf } from '../render/utils.js';
import type { RenderResult } from '../render/types.js';
import type { SnapshotFile } from './types.js';

export function snapshotFileName(index: number, url: string): string {
  const host = hostnameOf(url) ?? 'invalid-url';
  const slug = host
    .replace(/^www\./, '')
    .replace(/[^\w.-]/g, '-')
    .substring(0, 60);
  return `${String(index + 1).padStart(3, '0')}-${slug}.html`;
}

/**
 * Writes the HTML of every successful result into `outputDir`, one file per
 * URL, named after its position in the batch and its host.
 */
export async function writeHtmlSnapshots(
  results: readonly RenderResult[],
  outputDir: string
): Promise<SnapshotFile[]> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new RenderError(
      ErrorCode.OUTPUT_WRITE_FAILED,
      `Failed to create snapshot directory: ${outputDir}`,
      false,
      `Check permissions for directory: ${outputDir}`,
      { cause: describeError(error) }
    );
  }

  const written: SnapshotFile[] = [];
  for (const [index, result] of results.entries()) {
    if (!result.success || result.htmlContent === undefined) {
      continue;
    }
    const filePath = path.join(outputDir, snapshotFileName(index, result.url));
    try {
      await fs.writeFile(filePath, result.htmlContent, 'utf-8');
    } catch (error) {
      throw new RenderError(
        ErrorCode.OUTPUT_WRITE_FAILED,
        `Failed to write snapshot ${filePath}: ${describeError(error)}`,
        false,
        `Check permissions for directory: ${outputDir}`,
        { url: result.url }
      );
    }
    written.push({ url: result.url, path: filePath });
  }
  return written;
}
