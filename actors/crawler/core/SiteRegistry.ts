import { logger } from '../../../shared/logger';
import type { SiteDefinition } from './types';

// ================================================
// SITE REGISTRY
// ================================================

const registry = new Map<string, SiteDefinition>();

/**
 * Register a site definition under its `config.site` key
 */
export function registerSite(definition: SiteDefinition): void {
  const { site } = definition.config;
  if (registry.has(site)) {
    logger.warn(`Site '${site}' is already registered, overwriting...`);
  }
  registry.set(site, definition);
  logger.debug(`Registered site: ${site}`);
}

/**
 * Get a site definition by key
 */
export function getSite(site: string): SiteDefinition | null {
  return registry.get(site) ?? null;
}

/**
 * Get all registered site keys, sorted
 */
export function getRegisteredSites(): string[] {
  return Array.from(registry.keys()).sort();
}

export function hasSite(site: string): boolean {
  return registry.has(site);
}

// ================================================
// DEFINITION HELPER
// ================================================

/**
 * Define a site (helper for type safety)
 */
export function defineSite(definition: SiteDefinition): SiteDefinition {
  return definition;
}
