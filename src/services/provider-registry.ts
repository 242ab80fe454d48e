import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { ProviderIdSchema, type ProviderDescriptor, type ProviderId } from '../types/index.js';
import type { LocationProvider, ProviderFactory } from './location-provider.js';
import { TomTomProvider } from './tomtom-provider.js';
import { HereProvider } from './here-provider.js';

export interface RegisteredProvider {
  readonly descriptor: ProviderDescriptor;
  readonly provider: LocationProvider;
}

/**
 * Ordered set of providers. The order given to the constructor is the
 * fallback order and never changes afterwards.
 */
export class ProviderRegistry {
  private readonly entries: readonly RegisteredProvider[];

  constructor(providers: readonly LocationProvider[]) {
    const seen = new Set<string>();
    this.entries = Object.freeze(
      providers.map((provider, index) => {
        if (seen.has(provider.name)) {
          throw new Error(`Duplicate provider name: ${provider.name}`);
        }
        seen.add(provider.name);

        const descriptor: ProviderDescriptor = Object.freeze({
          name: provider.name,
          allowsCaching: provider.allowsCaching,
          cacheTtlMs: provider.cacheTtlMs,
          priority: index,
        });
        return Object.freeze({ descriptor, provider });
      })
    );
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly RegisteredProvider[] {
    return this.entries;
  }

  descriptors(): ProviderDescriptor[] {
    return this.entries.map((entry) => entry.descriptor);
  }

  get(name: string): RegisteredProvider | undefined {
    return this.entries.find((entry) => entry.descriptor.name === name);
  }

  getAvailableProviders(): string[] {
    return this.entries.map((entry) => entry.descriptor.name);
  }

  getDefaultProvider(): string | null {
    return this.entries[0]?.descriptor.name ?? null;
  }

  isProviderAvailable(name: string): boolean {
    return this.get(name) !== undefined;
  }
}

/**
 * Build the configured vendor clients in fallback order. Providers named in
 * PROVIDER_PRIORITY come first, in that order; any other enabled provider
 * follows in its default position.
 */
export function createProviders(config: Config, logger: Logger): LocationProvider[] {
  const factories: Record<ProviderId, ProviderFactory | null> = {
    tomtom: config.tomtom.enabled
      ? () =>
          new TomTomProvider({
            apiKey: config.tomtom.apiKey,
            baseUrl: config.tomtom.baseUrl,
            requestTimeoutMs: config.tomtom.requestTimeoutMs,
            logger,
          })
      : null,
    here: config.here.enabled
      ? () =>
          new HereProvider({
            apiKey: config.here.apiKey,
            cacheTtlMs: config.here.cacheTtlMs,
            geocodingBaseUrl: config.here.geocodingBaseUrl,
            reverseGeocodeBaseUrl: config.here.reverseGeocodeBaseUrl,
            routingBaseUrl: config.here.routingBaseUrl,
            requestTimeoutMs: config.here.requestTimeoutMs,
            logger,
          })
      : null,
  };

  const order = [...new Set([...config.providerPriority, ...ProviderIdSchema.options])];
  const providers: LocationProvider[] = [];
  for (const id of order) {
    const factory = factories[id];
    if (factory) {
      providers.push(factory());
    } else if (config.providerPriority.includes(id)) {
      logger.warn({ provider: id }, 'Provider listed in PROVIDER_PRIORITY has no API key, skipping');
    }
  }

  return providers;
}
