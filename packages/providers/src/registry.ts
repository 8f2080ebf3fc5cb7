/**
 * Provider Registry
 *
 * Descriptor catalogue plus the factory that materialises an authenticated
 * client for one user. Constructed once at startup and passed to whoever
 * needs it.
 */

import { PROVIDER_NAMES, isProviderName, type ProviderName } from '@pierre/protocol';
import { ValidationError } from '@pierre/core';
import { PROVIDER_DESCRIPTORS } from './descriptors.js';
import { StravaProvider } from './clients/strava.js';
import { FitbitProvider } from './clients/fitbit.js';
import { GarminProvider } from './clients/garmin.js';
import { WhoopProvider } from './clients/whoop.js';
import { CorosProvider } from './clients/coros.js';
import { TerraProvider } from './clients/terra.js';
import type {
  FitnessProvider,
  ProviderClientOptions,
  ProviderCredentials,
  ProviderDescriptor,
} from './types.js';

export type ProviderFactory = (
  descriptor: ProviderDescriptor,
  credentials: ProviderCredentials,
  options: ProviderClientOptions
) => FitnessProvider;

const DEFAULT_FACTORIES: Record<ProviderName, ProviderFactory> = {
  strava: (d, c, o) => new StravaProvider(d, c, o),
  fitbit: (d, c, o) => new FitbitProvider(d, c, o),
  garmin: (d, c, o) => new GarminProvider(d, c, o),
  whoop: (d, c, o) => new WhoopProvider(d, c, o),
  coros: (d, c, o) => new CorosProvider(d, c, o),
  terra: (d, c, o) => new TerraProvider(d, c, o),
};

export interface ProviderRegistryOptions {
  /** Default client timeout (ms) */
  timeoutMs?: number;
  /** Replace the client for a provider, e.g. with an in-process fake */
  factories?: Partial<Record<ProviderName, ProviderFactory>>;
}

export class ProviderRegistry {
  private readonly factories: Record<ProviderName, ProviderFactory>;
  private readonly timeoutMs: number | undefined;

  constructor(options: ProviderRegistryOptions = {}) {
    this.factories = { ...DEFAULT_FACTORIES, ...options.factories };
    this.timeoutMs = options.timeoutMs;
  }

  isSupported(name: string): name is ProviderName {
    return isProviderName(name);
  }

  /**
   * @throws ValidationError for an unknown provider name
   */
  getDescriptor(name: string): ProviderDescriptor {
    if (!isProviderName(name)) {
      throw new ValidationError(`Unsupported provider: ${name}`);
    }
    return PROVIDER_DESCRIPTORS[name];
  }

  listProviders(): ProviderDescriptor[] {
    return PROVIDER_NAMES.map((name) => PROVIDER_DESCRIPTORS[name]);
  }

  /** Providers connected through an OAuth 2.0 code flow */
  oauthProviders(): ProviderDescriptor[] {
    return this.listProviders().filter((descriptor) => descriptor.oauth !== null);
  }

  createProvider(name: string, credentials: ProviderCredentials, options: ProviderClientOptions = {}): FitnessProvider {
    const descriptor = this.getDescriptor(name);
    return this.factories[descriptor.name](descriptor, credentials, {
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });
  }
}
