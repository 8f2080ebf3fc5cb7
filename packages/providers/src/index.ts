/**
 * @pierre/providers
 *
 * Upstream fitness providers: descriptors, registry, HTTP clients and the
 * caching decorator.
 */

export * from './types.js';
export * from './descriptors.js';
export * from './registry.js';
export * from './caching-provider.js';
export { HttpFitnessProvider, errorForStatus, summarize, DEFAULT_UPSTREAM_TIMEOUT_MS } from './clients/http-provider.js';
export { StravaProvider } from './clients/strava.js';
export { FitbitProvider } from './clients/fitbit.js';
export { GarminProvider } from './clients/garmin.js';
export { WhoopProvider } from './clients/whoop.js';
export { CorosProvider } from './clients/coros.js';
export { TerraProvider } from './clients/terra.js';
