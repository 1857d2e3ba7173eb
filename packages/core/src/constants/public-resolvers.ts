export interface ResolverInfo {
  ip: string;
  name: string;
  provider: string;
}

/** Resolvers queried for propagation checks when none are configured. */
export const DEFAULT_PUBLIC_RESOLVERS: readonly ResolverInfo[] = [
  { ip: "8.8.8.8", name: "Google", provider: "Google DNS" },
  { ip: "8.8.4.4", name: "Google", provider: "Google DNS" },
  { ip: "1.1.1.1", name: "Cloudflare", provider: "Cloudflare DNS" },
  { ip: "1.0.0.1", name: "Cloudflare", provider: "Cloudflare DNS" },
  { ip: "9.9.9.9", name: "Quad9", provider: "Quad9 DNS" },
  { ip: "149.112.112.112", name: "Quad9", provider: "Quad9 DNS" },
  { ip: "208.67.222.222", name: "OpenDNS", provider: "OpenDNS" },
  { ip: "208.67.220.220", name: "OpenDNS", provider: "OpenDNS" },
];
