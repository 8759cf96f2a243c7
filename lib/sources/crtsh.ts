import logger from '../logger';
import { CONFIG } from '../config';
import { QueryError } from '../errors';
import { incQueryAttempt, observeQueryLatency } from '../metrics';
import { isHostname, isStrictSubdomain, normalizeCertName } from '../subdomain';

export type QueryResult =
  | { ok: true; subdomains: Set<string> }
  | { ok: false; error: QueryError };

export interface CrtShOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export function crtShUrl(domain: string, baseUrl = CONFIG.CRTSH_BASE_URL): string {
  const url = new URL(baseUrl);
  // %25 is a literal "%" wildcard for crt.sh's identity search
  url.search = `q=%25.${encodeURIComponent(domain)}&output=json`;
  return url.toString();
}

/**
 * crt.sh — Certificate Transparency log search.
 * One request per call; retries are the caller's business.
 */
export async function queryCertificates(domain: string, opts?: CrtShOptions): Promise<QueryResult> {
  const url = crtShUrl(domain, opts?.baseUrl);
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  const started = Date.now();

  try {
    const res = await fetch(url, {
      headers: { 'User-Agent': CONFIG.USER_AGENT, Accept: 'application/json' },
      signal: controller.signal,
    });

    if (res.status === 429) {
      const ra = res.headers.get('retry-after');
      return fail(new QueryError('RateLimited', `crt.sh rate limited the query for ${domain} (HTTP 429)`, {
        status: 429,
        retryAfterMs: ra ? parseRetryAfter(ra) : undefined,
      }));
    }
    if (res.status >= 500) {
      return fail(new QueryError('ServiceUnavailable', `crt.sh returned HTTP ${res.status} for ${domain}`, {
        status: res.status,
      }));
    }
    if (!res.ok) {
      return fail(new QueryError('MalformedResponse', `crt.sh returned unexpected HTTP ${res.status} for ${domain}`, {
        status: res.status,
      }));
    }

    const body = await res.text();
    const subdomains = parseCertificates(body, domain);
    if (subdomains instanceof QueryError) return fail(subdomains);

    incQueryAttempt('ok');
    logger.debug({ domain, count: subdomains.size }, 'crt.sh query succeeded');
    return { ok: true, subdomains };
  } catch (err) {
    if (controller.signal.aborted) {
      return fail(new QueryError('Timeout', `crt.sh query for ${domain} timed out after ${timeoutMs}ms`, { cause: err }));
    }
    const message = err instanceof Error ? err.message : String(err);
    return fail(new QueryError('NetworkUnreachable', `crt.sh unreachable for ${domain}: ${message}`, { cause: err }));
  } finally {
    clearTimeout(id);
    observeQueryLatency((Date.now() - started) / 1000);
  }
}

function fail(error: QueryError): QueryResult {
  incQueryAttempt(error.kind);
  logger.debug({ kind: error.kind, status: error.status }, error.message);
  return { ok: false, error };
}

/**
 * Turn a crt.sh JSON body into the set of strict subdomains of `domain`.
 * An empty body means no certificates.
 */
export function parseCertificates(body: string, domain: string): Set<string> | QueryError {
  const subs = new Set<string>();
  if (!body.trim()) return subs;

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    return new QueryError('MalformedResponse', `crt.sh returned non-JSON data for ${domain}`, { cause: err });
  }
  if (!Array.isArray(data)) {
    return new QueryError('MalformedResponse', `crt.sh returned ${typeof data} instead of a certificate list for ${domain}`);
  }

  const records: unknown[] = data;
  for (const cert of records) {
    if (typeof cert !== 'object' || cert === null) {
      return new QueryError('MalformedResponse', `crt.sh returned a non-object certificate record for ${domain}`);
    }
    for (const field of ['name_value', 'common_name']) {
      const value: unknown = Reflect.get(cert, field);
      if (typeof value !== 'string') continue;
      for (const name of value.split(/[\s,]+/)) {
        const clean = normalizeCertName(name);
        if (isHostname(clean) && isStrictSubdomain(clean, domain)) subs.add(clean);
      }
    }
  }
  return subs;
}

function parseRetryAfter(val: string): number | undefined {
  // If numeric -> seconds
  const n = Number(val);
  if (!Number.isNaN(n)) return Math.max(0, n * 1000);
  // Attempt to parse HTTP-date
  const t = Date.parse(val);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return undefined;
}

export default queryCertificates;
