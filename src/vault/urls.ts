import ipaddr from 'ipaddr.js';
import type { BindingName, NetworkBinding } from '../system/network.js';

export type UrlContext = {
  network: NetworkBinding;
  tlsEnabled: boolean;
  apiPort: number;
  clusterPort: number;
};

export function getVaultUrl(ctx: UrlContext, binding: BindingName, port: number, address?: string): string {
  const protocol = ctx.tlsEnabled ? 'https' : 'http';
  const raw = address || ctx.network.resolve(binding);
  const host = ipaddr.IPv6.isValid(raw) ? `[${raw}]` : raw;
  return `${protocol}://${host}:${port}`;
}

export function getApiUrl(ctx: UrlContext, address?: string): string {
  return getVaultUrl(ctx, 'access', ctx.apiPort, address);
}

export function getClusterUrl(ctx: UrlContext, address?: string): string {
  return getVaultUrl(ctx, 'cluster', ctx.clusterPort, address);
}
