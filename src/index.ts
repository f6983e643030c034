// src/index.ts
export { RenderCoordinator, withRenderCoordinator, renderUrls } from './core/render/coordinator.js';
export { Semaphore } from './core/render/semaphore.js';
export { BlockListPolicy, allowAll, installResourcePolicy } from './core/render/resource-policy.js';
export { classifyRenderFailure, isConnectionError, NETWORK_ERROR_TYPES } from './core/render/classify.js';
export { RenderStatistics } from './core/render/statistics.js';
export { normalizeUrl } from './core/render/utils.js';
export { loadRendererConfig, resolveRendererOptions } from './core/config/renderer-config.js';
export { RenderError, ErrorCode } from './core/errors.js';
export { logger, Logger } from './core/logger.js';
export { BatchRunner } from './core/batch/runner.js';
export type { BatchOptions, BatchSummary } from './core/batch/runner.js';
export type {
  BrowserLauncher,
  RenderBrowser,
  RenderContext,
  RenderPage,
  RenderResult,
  RenderErrorType,
  RenderStatisticsSnapshot,
  RendererOptions,
  ResourcePolicy,
} from './core/render/types.js';
