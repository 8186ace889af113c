/**
 * Routes Index
 *
 * Barrel export for all API routes.
 */

export { healthRoutes, type HealthRouteOptions } from './health.js';
export { newznabRoutes, type NewznabRouteOptions } from './newznab.js';
export {
  sabnzbdRoutes,
  createSabnzbdHandler,
  queueSlot,
  historySlot,
  SABNZBD_VERSION,
  type SabnzbdHandler,
  type SabnzbdOptions,
} from './sabnzbd.js';
