// src/core/export/types.ts
import type { RenderResult, RenderStatisticsSnapshot } from '../render/types.js';

export type ExportedResult = Omit<RenderResult, 'htmlContent'> & {
  htmlContent?: string;
  htmlLength?: number;
};

export interface RenderReport {
  generatedAt: string;
  statistics: RenderStatisticsSnapshot;
  results: ExportedResult[];
}

export interface SnapshotFile {
  url: string;
  path: string;
}
