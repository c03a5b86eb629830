import type { IncomingHttpHeaders } from 'node:http';

export interface HttpAllowList {
  hosts: ReadonlySet<string>;
  origins: ReadonlySet<string>;
}

/** Host header without its port; IPv6 literals keep their brackets. */
export function hostName(hostHeader: string): string {
  const host = hostHeader.trim().toLowerCase();
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  return host.split(':')[0];
}

export function isHostAllowed(hostHeader: string | undefined, allowed: ReadonlySet<string>): boolean {
  if (!allowed.size || !hostHeader) return true;
  return allowed.has(hostName(hostHeader));
}

export function isOriginAllowed(originHeader: string | undefined, allowed: ReadonlySet<string>): boolean {
  if (!allowed.size || !originHeader) return true;
  return allowed.has(originHeader);
}

/** Reason to answer 403, or null when the request may reach the transport. */
export function rejectRequest(headers: IncomingHttpHeaders, allow: HttpAllowList): string | null {
  if (!isHostAllowed(headers.host, allow.hosts)) return 'Forbidden host';
  if (!isOriginAllowed(headers.origin, allow.origins)) return 'Forbidden origin';
  return null;
}
