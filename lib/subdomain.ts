/// <reference path="../types/psl.d.ts" />
import { toASCII } from "punycode/";
import psl from "psl";

/**
 * Normalize an input string to a host (ASCII/punycode), lowercase, stripped of protocol/path/port.
 * Returns the ASCII host or throws Error if can't parse.
 */
export function normalizeDomain(input: string): string {
  if (!input || typeof input !== "string") {
    throw new Error("Invalid input");
  }

  let s = input.trim();
  if (/\s/.test(s)) {
    throw new Error("Domain must not contain whitespace");
  }

  try {
    // If missing protocol, add dummy so URL parses
    if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(s)) {
      s = "http://" + s;
    }
    const url = new URL(s);
    return stripDots(toASCII(url.hostname).toLowerCase());
  } catch {
    // Fallback: treat as bare host, dropping port and path ("example.com:8080/path")
    const m = s.replace(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//, "").match(/^([^/ :]+)(?::\d+)?(?:\/.*)?$/);
    if (m) {
      return stripDots(toASCII(m[1]).toLowerCase());
    }
    throw new Error("Unable to normalize domain");
  }
}

function stripDots(host: string): string {
  return host.replace(/^\.+|\.+$/g, "");
}

/**
 * Basic host validation using psl.parse to check domain extraction.
 */
export function isValidHost(host: string): boolean {
  if (!host || typeof host !== "string") return false;
  const cleaned = host.trim().toLowerCase();
  if (/\s/.test(cleaned)) return false;
  if (!cleaned.includes(".")) return false;
  let ascii: string;
  try {
    ascii = toASCII(cleaned);
  } catch {
    return false;
  }
  if (ascii.length > 255) return false;

  const parsed = psl.parse(ascii);
  return !!parsed.domain;
}

/**
 * Parse a user-supplied domain for monitoring. Accepts URLs and mixed case;
 * returns the normalized domain or null when it is not a usable domain.
 */
export function parseMonitoredDomain(input: string): string | null {
  if (!input || /\s/.test(input.trim())) return null;
  let host: string;
  try {
    host = normalizeDomain(input);
  } catch {
    return null;
  }
  return isValidHost(host) ? host : null;
}

/**
 * Normalize one certificate name: lower-case, trimmed, trailing dot and
 * wildcard labels removed ("*.api.example.com." -> "api.example.com").
 */
export function normalizeCertName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/\.+$/, "")
    .replace(/^(\*\.)+/, "");
}

/**
 * True for a normalized DNS name: ASCII labels of letters, digits, `-` and `_`.
 * Rejects e-mail identities ("admin@mail.example.com") found in S/MIME certificates.
 */
export function isHostname(name: string): boolean {
  return /^[a-z0-9_-]+(\.[a-z0-9_-]+)*$/.test(name);
}

/** True when `host` is strictly below `domain` (the domain itself is excluded). */
export function isStrictSubdomain(host: string, domain: string): boolean {
  return host.length > domain.length + 1 && host.endsWith(`.${domain}`);
}
