// src/core/render/types.ts
import type { BrowserContextOptions, LaunchOptions } from 'playwright';

export type RenderErrorType =
  | 'validation_error'
  | 'http_error'
  | 'timeout_error'
  | 'dns_error'
  | 'connection_refused'
  | 'connection_timeout'
  | 'engine_error'
  | 'unexpected_error'
  | 'execution_error';

export interface RenderResult {
  readonly url: string;
  readonly success: boolean;
  readonly htmlContent?: string;
  readonly title?: string;
  readonly finalUrl?: string;
  readonly statusCode?: number;
  readonly renderTimeSeconds?: number;
  readonly errorMessage?: string;
  readonly errorType?: RenderErrorType;
}

export interface RenderStatisticsSnapshot {
  totalRequests: number;
  successfulRenders: number;
  failedRenders: number;
  timeoutErrors: number;
  connectionErrors: number;
  otherErrors: number;
  totalRenderTime: number;
  successRate: number;
  averageRenderTime: number;
}

/**
 * Decides per intercepted request whether it may hit the network.
 */
export interface ResourcePolicy {
  shouldAllow(resourceType: string): boolean;
}

export interface RendererOptions {
  maxWorkers?: number;
  timeoutSeconds?: number;
  headless?: boolean;
  blockResources?: boolean;
  userAgent?: string;
  settleDelayMs?: number;
  resourcePolicy?: ResourcePolicy;
  launchArgs?: readonly string[];
}

export interface ResolvedRendererOptions {
  readonly maxWorkers: number;
  readonly timeoutSeconds: number;
  readonly headless: boolean;
  readonly blockResources: boolean;
  readonly userAgent: string;
  readonly settleDelayMs: number;
  readonly resourcePolicy: ResourcePolicy;
  readonly launchArgs: readonly string[];
}

// The slice of the automation engine the coordinator drives. Playwright's
// `chromium`, `Browser`, `BrowserContext`, `Page` and `Route` satisfy these.

export interface InterceptedRequest {
  resourceType(): string;
  url(): string;
}

export interface InterceptedRoute {
  request(): InterceptedRequest;
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export type RouteHandler = (route: InterceptedRoute) => Promise<void>;

export interface NavigationResponse {
  status(): number;
}

export interface NavigationOptions {
  waitUntil: 'domcontentloaded';
  timeout: number;
}

export interface RenderPage {
  route(url: string, handler: RouteHandler): Promise<void>;
  goto(url: string, options: NavigationOptions): Promise<NavigationResponse | null>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
  title(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newContext(options: BrowserContextOptions): Promise<RenderContext>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options: LaunchOptions): Promise<RenderBrowser>;
}
