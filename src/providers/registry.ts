/**
 * registry.ts - Provider lookup by name
 */

import { UnknownProviderError } from "../errors";
import { NetworkOperatorProvider } from "./network-operator";
import type { CapabilityProvider } from "./types";

export type ProviderFactory = () => CapabilityProvider;

/** Providers shipped with the CLI. */
export const BUILTIN_PROVIDERS: Record<string, ProviderFactory> = {
  "network-operator": () => new NetworkOperatorProvider(),
};

/**
 * Instantiates the enabled providers, keyed by name, in the order given.
 * Repeated names are instantiated once.
 *
 * @throws UnknownProviderError for a name with no factory
 */
export function buildRegistry(
  names: string[],
  factories: Record<string, ProviderFactory> = BUILTIN_PROVIDERS
): Map<string, CapabilityProvider> {
  const registry = new Map<string, CapabilityProvider>();

  for (const name of names) {
    if (registry.has(name)) continue;
    const factory = Object.prototype.hasOwnProperty.call(factories, name)
      ? factories[name]
      : undefined;
    if (!factory) {
      throw new UnknownProviderError(name, Object.keys(factories).sort());
    }
    registry.set(name, factory());
  }

  return registry;
}

/**
 * Looks up the provider that owns a resolved profile.
 *
 * @throws UnknownProviderError when the provider isn't registered
 */
export function providerFor(
  registry: Map<string, CapabilityProvider>,
  providerName: string
): CapabilityProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new UnknownProviderError(providerName, [...registry.keys()]);
  }
  return provider;
}
