// src/core/render/resource-policy.ts
import { BLOCKED_RESOURCE_TYPES } from '../config/constants.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { InterceptedRoute, RenderPage, ResourcePolicy } from './types.js';

const log = logger.child('resources');

export class BlockListPolicy implements ResourcePolicy {
  private readonly blocked: ReadonlySet<string>;

  constructor(blockedTypes: Iterable<string> = BLOCKED_RESOURCE_TYPES) {
    this.blocked = new Set(blockedTypes);
  }

  shouldAllow(resourceType: string): boolean {
    return !this.blocked.has(resourceType);
  }

  blockedTypes(): string[] {
    return [...this.blocked];
  }
}

export const allowAll: ResourcePolicy = {
  shouldAllow: () => true,
};

/**
 * Routes every request of the page through the policy. Any failure while
 * deciding or aborting falls back to letting the request through, so a
 * broken handler never stalls navigation.
 */
export async function installResourcePolicy(page: RenderPage, policy: ResourcePolicy): Promise<void> {
  await page.route('**/*', (route) => handleRoute(route, policy));
}

export async function handleRoute(route: InterceptedRoute, policy: ResourcePolicy): Promise<void> {
  let allow = true;
  try {
    allow = policy.shouldAllow(route.request().resourceType());
  } catch (error) {
    log.warn(`Resource policy failed, allowing request: ${describeError(error)}`);
  }

  try {
    if (allow) {
      await route.continue();
    } else {
      await route.abort();
    }
  } catch (error) {
    log.warn(`Route handling error: ${describeError(error)}`);
    if (!allow) {
      await continueQuietly(route);
    }
  }
}

async function continueQuietly(route: InterceptedRoute): Promise<void> {
  try {
    await route.continue();
  } catch (error) {
    // The route may already have been handled by the engine
    log.debug(`Route fallback skipped: ${describeError(error)}`);
  }
}
