/** On-disk / in-Redis shape of one domain's known subdomains. */
export interface StoredSubdomains {
  domain: string;
  subdomains: string[]; // sorted
  updatedAt: string; // ISO timestamp
}

export function encodeSubdomains(domain: string, subdomains: ReadonlySet<string>): string {
  const payload: StoredSubdomains = {
    domain,
    subdomains: Array.from(subdomains).sort(),
    updatedAt: new Date().toISOString(),
  };
  return JSON.stringify(payload, null, 2);
}

/**
 * Parse and validate a stored payload. Throws on anything that is not the
 * expected shape; a bare string array (older layout) is accepted too.
 */
export function decodeSubdomains(raw: string): Set<string> {
  const data: unknown = JSON.parse(raw);
  const list = Array.isArray(data) ? data : typeof data === 'object' && data !== null ? Reflect.get(data, 'subdomains') : undefined;
  if (!Array.isArray(list)) {
    throw new TypeError('stored value has no subdomain list');
  }
  const out = new Set<string>();
  for (const item of list) {
    if (typeof item !== 'string') throw new TypeError('stored subdomain list contains a non-string entry');
    out.add(item);
  }
  return out;
}
