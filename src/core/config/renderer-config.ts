// src/core/config/renderer-config.ts
import {
  BROWSER_LAUNCH_ARGS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_USER_AGENT,
  ENV_PREFIX,
  MAX_SETTLE_DELAY_MS,
  MAX_TIMEOUT_SECONDS,
  MAX_WORKERS_LIMIT,
} from './constants.js';
import { ErrorCode, RenderError } from '../errors.js';
import { isLogLevel, type LogLevel } from '../logger.js';
import { BlockListPolicy } from '../render/resource-policy.js';
import type { RendererOptions, ResolvedRendererOptions } from '../render/types.js';

export interface EnvironmentConfig {
  renderer: RendererOptions;
  logLevel?: LogLevel;
}

function invalidConfig(name: string, message: string): RenderError {
  return new RenderError(
    ErrorCode.INVALID_CONFIG,
    `${name} ${message}`,
    false,
    `Fix ${name} and try again`,
    { option: name }
  );
}

function checkInteger(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value)) {
    throw invalidConfig(name, `must be an integer, got ${value}`);
  }
  if (value < min || value > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function checkTimeout(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidConfig(name, `must be a positive number, got ${value}`);
  }
  if (value > MAX_TIMEOUT_SECONDS) {
    throw invalidConfig(name, `too large (max ${MAX_TIMEOUT_SECONDS} seconds), got ${value}`);
  }
  return value;
}

/**
 * Applies defaults and range checks. The result is frozen: renderer
 * configuration cannot change after construction.
 */
export function resolveRendererOptions(options: RendererOptions = {}): ResolvedRendererOptions {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  if (userAgent.trim().length === 0) {
    throw invalidConfig('userAgent', 'must not be empty');
  }

  return Object.freeze({
    maxWorkers: checkInteger('maxWorkers', options.maxWorkers ?? DEFAULT_MAX_WORKERS, 1, MAX_WORKERS_LIMIT),
    timeoutSeconds: checkTimeout('timeoutSeconds', options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS),
    headless: options.headless ?? true,
    blockResources: options.blockResources ?? true,
    userAgent,
    settleDelayMs: checkInteger('settleDelayMs', options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS, 0, MAX_SETTLE_DELAY_MS),
    resourcePolicy: options.resourcePolicy ?? new BlockListPolicy(),
    launchArgs: Object.freeze([...BROWSER_LAUNCH_ARGS, ...(options.launchArgs ?? [])]),
  });
}

export function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw invalidConfig(name, `must be a boolean (true/false), got "${raw}"`);
  }
}

export function parseNumber(name: string, raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed.length === 0 || Number.isNaN(value)) {
    throw invalidConfig(name, `must be a number, got "${raw}"`);
  }
  return value;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[`${ENV_PREFIX}${key}`];
  return value === undefined || value.trim().length === 0 ? undefined : value;
}

/**
 * Reads LEAD_RENDER_* variables. Unset variables are left out so that
 * defaults (or CLI flags) apply.
 */
export function loadRendererConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const renderer: RendererOptions = {};

  const maxWorkers = readEnv(env, 'MAX_WORKERS');
  if (maxWorkers !== undefined) {
    const name = `${ENV_PREFIX}MAX_WORKERS`;
    renderer.maxWorkers = checkInteger(name, parseNumber(name, maxWorkers), 1, MAX_WORKERS_LIMIT);
  }

  const timeout = readEnv(env, 'TIMEOUT_SECONDS');
  if (timeout !== undefined) {
    const name = `${ENV_PREFIX}TIMEOUT_SECONDS`;
    renderer.timeoutSeconds = checkTimeout(name, parseNumber(name, timeout));
  }

  const headless = readEnv(env, 'HEADLESS');
  if (headless !== undefined) {
    renderer.headless = parseBoolean(`${ENV_PREFIX}HEADLESS`, headless);
  }

  const blockResources = readEnv(env, 'BLOCK_RESOURCES');
  if (blockResources !== undefined) {
    renderer.blockResources = parseBoolean(`${ENV_PREFIX}BLOCK_RESOURCES`, blockResources);
  }

  const userAgent = readEnv(env, 'USER_AGENT');
  if (userAgent !== undefined) {
    renderer.userAgent = userAgent.trim();
  }

  const settle = readEnv(env, 'SETTLE_MS');
  if (settle !== undefined) {
    const name = `${ENV_PREFIX}SETTLE_MS`;
    renderer.settleDelayMs = checkInteger(name, parseNumber(name, settle), 0, MAX_SETTLE_DELAY_MS);
  }

  const config: EnvironmentConfig = { renderer };

  const level = readEnv(env, 'LOG_LEVEL');
  if (level !== undefined) {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw invalidConfig(`${ENV_PREFIX}LOG_LEVEL`, `must be one of silent, error, warn, info, debug, got "${level}"`);
    }
    config.logLevel = normalized;
  }

  return config;
}
