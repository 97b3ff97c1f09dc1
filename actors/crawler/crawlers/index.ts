/**
 * Site Registry - Auto-registers all sites
 *
 * Import this file to register all available sites with the registry.
 */

import './youtube-shorts';

// Re-export registry functions for convenience
export { getRegisteredSites, getSite, hasSite } from '../core';
