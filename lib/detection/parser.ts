/**
 * Email Parser
 * Normalises caller-supplied messages and extracts sender, header and URL data
 */

import type { EmailMessage, EmailAddress } from './types';

/**
 * Coerce a possibly malformed message into a well-formed EmailMessage.
 * Missing or non-string fields become empty text; header names are lowercased.
 */
export function normalizeEmail(input: Partial<EmailMessage> | null | undefined): EmailMessage {
  const headers: Record<string, string> = {};

  if (input?.headers && typeof input.headers === 'object') {
    for (const [name, value] of Object.entries(input.headers)) {
      if (typeof value === 'string') {
        headers[name.toLowerCase()] = value;
      }
    }
  }

  return {
    subject: asText(input?.subject),
    body: asText(input?.body),
    sender: asText(input?.sender),
    headers,
  };
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(email: EmailMessage, name: string): string | undefined {
  if (!email.headers) return undefined;

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(email.headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse a From/Reply-To style address
 */
export function parseEmailAddress(raw: string): EmailAddress {
  const trimmed = raw.trim();

  // Format 1: "Display Name" <email@domain.com>
  const quotedMatch = trimmed.match(/^"([^"]*)"\s*<([^<>\s]+@[^<>\s]+)>$/);
  if (quotedMatch) {
    return withDisplayName(quotedMatch[2], quotedMatch[1]);
  }

  // Format 2: Display Name <email@domain.com>
  const angleMatch = trimmed.match(/^([^<]+)<([^<>\s]+@[^<>\s]+)>$/);
  if (angleMatch) {
    return withDisplayName(angleMatch[2], angleMatch[1]);
  }

  // Format 3: bare address, with or without brackets
  const emailMatch = trimmed.match(/([^\s<>@"]+@[^\s<>@"]+)/);
  if (emailMatch) {
    const address = emailMatch[1].toLowerCase();
    return { address, domain: extractDomain(address) };
  }

  const address = trimmed.toLowerCase();
  return { address, domain: extractDomain(address) };
}

/**
 * Domain part of an address, lowercased; empty when there is none
 */
export function extractDomain(address: string): string {
  const at = address.lastIndexOf('@');
  if (at === -1) return '';
  return address.slice(at + 1).replace(/>$/, '').trim().toLowerCase();
}

/**
 * Extract http(s) URLs from text, deduplicated in first-seen order
 */
export function extractUrls(content: string): string[] {
  const matches = content.match(/https?:\/\/[^\s<>"')]+/gi) ?? [];
  return [...new Set(matches)];
}

/**
 * Hostname of a URL, lowercased; null when the URL does not parse
 */
export function hostFromUrl(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function withDisplayName(rawAddress: string, rawName: string): EmailAddress {
  const address = rawAddress.toLowerCase();
  const displayName = rawName.trim();
  return {
    address,
    ...(displayName ? { displayName } : {}),
    domain: extractDomain(address),
  };
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}
