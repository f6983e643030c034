// src/core/config/constants.ts
export const DEFAULT_MAX_WORKERS = 5;
export const MAX_WORKERS_LIMIT = 20;
export const DEFAULT_TIMEOUT_SECONDS = 15;
export const MAX_TIMEOUT_SECONDS = 300;
export const DEFAULT_SETTLE_DELAY_MS = 1000; // grace period for late scripts after DOMContentLoaded
export const MAX_SETTLE_DELAY_MS = 10000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

export const BLOCKED_RESOURCE_TYPES = ['image', 'stylesheet', 'font', 'media', 'manifest'] as const;

// Containers rarely allow the Chromium sandbox; throttling flags keep background contexts rendering.
export const BROWSER_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-web-security',
  '--disable-features=TranslateUI',
  '--disable-ipc-flooding-protection',
  '--disable-background-timer-throttling',
  '--disable-renderer-backgrounding',
] as const;

export const ENV_PREFIX = 'LEAD_RENDER_';
