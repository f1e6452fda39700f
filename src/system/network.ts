import os from 'node:os';
import ipaddr from 'ipaddr.js';
import type { Logger } from 'pino';

export type BindingName = 'access' | 'cluster';

export type AddressStrategy = {
  name: string;
  resolve(binding: BindingName): string | undefined;
};

type Interfaces = ReturnType<typeof os.networkInterfaces>;

function ipv4Addresses(interfaces: Interfaces): string[] {
  const out: string[] = [];
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) out.push(entry.address);
    }
  }
  return out;
}

/** Addresses the operator pinned per binding. */
export function configuredAddressStrategy(addresses: Partial<Record<BindingName, string>>): AddressStrategy {
  return {
    name: 'configured',
    resolve: (binding) => addresses[binding]?.trim() || undefined
  };
}

/** The unit's private address, whatever the binding. */
export function privateAddressStrategy(interfaces: () => Interfaces = os.networkInterfaces): AddressStrategy {
  return {
    name: 'private-address',
    resolve: () => ipv4Addresses(interfaces()).find((a) => ipaddr.parse(a).range() === 'private')
  };
}

export function anyAddressStrategy(interfaces: () => Interfaces = os.networkInterfaces): AddressStrategy {
  return {
    name: 'any-address',
    resolve: () => ipv4Addresses(interfaces())[0]
  };
}

/** Tries each strategy in order; the first address found wins. */
export class NetworkBinding {
  constructor(
    private readonly strategies: AddressStrategy[],
    private readonly log?: Logger
  ) {}

  resolve(binding: BindingName): string {
    for (const strategy of this.strategies) {
      const address = strategy.resolve(binding);
      if (address) {
        this.log?.debug({ binding, address, strategy: strategy.name }, 'Resolved binding address');
        return address;
      }
    }
    throw new Error(`No address for binding ${binding}`);
  }
}
