/**
 * Detection rule catalog
 *
 * Pattern rules run case-insensitively over "subject\nbody". Structural rules
 * inspect the parsed sender, headers and extracted links. A rule fires at most
 * once per message; catalog order is detection order.
 */

import type { EmailAddress, EmailMessage, ThreatCategory } from './types';
import { extractDomain, extractUrls, getHeader, hostFromUrl, parseEmailAddress } from './parser';

export interface RuleContext {
  email: EmailMessage;
  text: string;
  sender: EmailAddress;
  urls: string[];
  hosts: string[];
}

interface BaseRule {
  id: string;
  category: ThreatCategory;
  weight: number;
  description: string;
}

export interface PatternRule extends BaseRule {
  kind: 'pattern';
  pattern: RegExp;
}

export interface StructuralRule extends BaseRule {
  kind: 'structural';
  /** Returns a detail string when the rule fires, otherwise null */
  check: (context: RuleContext) => string | null;
}

export type DetectionRule = PatternRule | StructuralRule;

// Brands commonly impersonated in display names and link domains
const BRAND_DOMAINS = [
  'paypal.com', 'amazon.com', 'microsoft.com', 'apple.com', 'google.com',
  'netflix.com', 'bankofamerica.com', 'chase.com', 'wellsfargo.com', 'dropbox.com',
  'linkedin.com', 'docusign.com', 'facebook.com', 'adobe.com', 'fedex.com', 'dhl.com',
];

const BRAND_NAMES = BRAND_DOMAINS.map((domain) => domain.split('.')[0]);

const URL_SHORTENERS = new Set([
  'bit.ly', 'tinyurl.com', 't.co', 'goo.gl', 'ow.ly', 'is.gd',
  'buff.ly', 'rebrand.ly', 'cutt.ly', 'shorturl.at',
]);

// ASCII look-alikes survive URL parsing; non-ASCII hosts become punycode
const HOMOGLYPHS: Record<string, string[]> = {
  'a': ['4', '@'],
  'b': ['8'],
  'e': ['3'],
  'g': ['9', 'q'],
  'i': ['1', 'l', '!'],
  'l': ['1', 'i', 'I'],
  'm': ['n'],
  'n': ['m'],
  'o': ['0'],
  's': ['5', '$'],
  't': ['7'],
  'z': ['2'],
};

// Second levels registries place under a ccTLD (co.uk, com.au, ac.jp)
const SECOND_LEVEL_SUFFIXES = new Set(['co', 'com', 'net', 'org', 'gov', 'ac', 'edu', 'ne', 'or']);

const IPV4_HOST = /^\d{1,3}(\.\d{1,3}){3}$/;

export const DETECTION_RULES: readonly DetectionRule[] = [
  // Linguistic manipulation
  {
    kind: 'pattern',
    id: 'urgency-language',
    category: 'linguistic_manipulation',
    weight: 0.2,
    description: 'Urgency language',
    pattern: /\b(urgent|urgently|immediately|immediate action|act now|asap|right away|without delay)\b/i,
  },
  {
    kind: 'pattern',
    id: 'deadline-pressure',
    category: 'linguistic_manipulation',
    weight: 0.15,
    description: 'Deadline pressure',
    pattern: /\b(within \d+ (hours?|days?)|expires? (today|tonight|soon)|last (chance|warning|notice)|final (notice|reminder)|limited time)\b/i,
  },
  {
    kind: 'pattern',
    id: 'emotional-trigger',
    category: 'linguistic_manipulation',
    weight: 0.15,
    description: 'Emotional trigger',
    pattern: /\b(congratulations|you('ve| have) (won|been selected)|claim your (prize|reward|refund)|lottery|free gift|exclusive offer)\b/i,
  },

  // Technical indicators
  {
    kind: 'structural',
    id: 'display-name-mismatch',
    category: 'technical_indicator',
    weight: 0.25,
    description: 'Display name does not match sender domain',
    check: ({ sender }) => detectDisplayNameMismatch(sender),
  },
  {
    kind: 'structural',
    id: 'reply-to-mismatch',
    category: 'technical_indicator',
    weight: 0.15,
    description: 'Reply-To domain differs from sender domain',
    check: ({ email, sender }) => detectHeaderDomainMismatch(email, sender, 'reply-to', 'Reply-To'),
  },
  {
    kind: 'structural',
    id: 'return-path-mismatch',
    category: 'technical_indicator',
    weight: 0.1,
    description: 'Return-Path domain differs from sender domain',
    check: ({ email, sender }) => detectHeaderDomainMismatch(email, sender, 'return-path', 'Return-Path'),
  },
  {
    kind: 'structural',
    id: 'authentication-failure',
    category: 'technical_indicator',
    weight: 0.25,
    description: 'Sender authentication failed',
    check: ({ email }) => detectAuthenticationFailure(email),
  },
  {
    kind: 'structural',
    id: 'ip-literal-url',
    category: 'technical_indicator',
    weight: 0.25,
    description: 'Link points at a raw IP address',
    check: ({ hosts }) => {
      const host = hosts.find((h) => IPV4_HOST.test(h) || h.startsWith('['));
      return host ? `Link points at a raw IP address (${host})` : null;
    },
  },
  {
    kind: 'structural',
    id: 'lookalike-domain',
    category: 'technical_indicator',
    weight: 0.3,
    description: 'Lookalike domain',
    check: ({ hosts, sender }) => detectLookalike([sender.domain, ...hosts]),
  },
  {
    kind: 'structural',
    id: 'shortened-url',
    category: 'technical_indicator',
    weight: 0.1,
    description: 'Shortened link hides its destination',
    check: ({ hosts }) => {
      const host = hosts.find((h) => URL_SHORTENERS.has(h));
      return host ? `Shortened link hides its destination (${host})` : null;
    },
  },

  // Social engineering
  {
    kind: 'pattern',
    id: 'authority-impersonation',
    category: 'social_engineering',
    weight: 0.15,
    description: 'Authority impersonation',
    pattern: /\b(it department|it support|security team|help ?desk|system administrator|fraud department|account team|ceo|chief executive|irs|tax authority)\b/i,
  },
  {
    kind: 'pattern',
    id: 'threat-language',
    category: 'social_engineering',
    weight: 0.2,
    description: 'Fear-based threat',
    pattern: /\b((will be|has been|have been) (suspended|locked|closed|terminated|disabled|deactivated)|(account|access|mailbox) (suspended|locked|closed|terminated|disabled)|security alert|unusual (activity|sign-in|login)|unauthori[sz]ed (access|activity|login|transaction)|legal action)\b/i,
  },
  {
    kind: 'pattern',
    id: 'verification-request',
    category: 'social_engineering',
    weight: 0.2,
    description: 'Account verification request',
    pattern: /\b(verify|confirm|validate) (your )?(account|identity|information|details)\b/i,
  },
  {
    kind: 'pattern',
    id: 'credential-request',
    category: 'social_engineering',
    weight: 0.25,
    description: 'Credential request',
    pattern: /\b(password|passcode|username|login|log in|sign in|credentials|social security|ssn)\b/i,
  },
  {
    kind: 'pattern',
    id: 'payment-request',
    category: 'social_engineering',
    weight: 0.25,
    description: 'Payment request',
    pattern: /\b(wire transfer|bank transfer|gift cards?|bitcoin|cryptocurrency|payment (details|information|method)|update (your )?(billing|payment)|overdue invoice|outstanding (invoice|balance))\b/i,
  },
];

/**
 * Build the shared inputs every rule reads from
 */
export function buildRuleContext(email: EmailMessage): RuleContext {
  const text = `${email.subject}\n${email.body}`;
  const urls = extractUrls(text);
  const hosts = urls
    .map(hostFromUrl)
    .filter((host): host is string => host !== null && host.length > 0);

  return {
    email,
    text,
    sender: parseEmailAddress(email.sender),
    urls,
    hosts,
  };
}

/**
 * Evaluate one rule; returns the indicator description or null
 */
export function evaluateRule(rule: DetectionRule, context: RuleContext): string | null {
  if (rule.kind === 'pattern') {
    const match = context.text.match(rule.pattern);
    return match ? `${rule.description}: "${match[0]}"` : null;
  }
  return rule.check(context);
}

/**
 * Display name names a brand the sender domain does not carry, or embeds an
 * address on a different domain (e.g. "service@paypal.com" <x@evil.test>)
 */
export function detectDisplayNameMismatch(sender: EmailAddress): string | null {
  if (!sender.displayName || !sender.domain) return null;

  const name = sender.displayName.toLowerCase();

  const embedded = name.match(/[^\s<>@"]+@[^\s<>@"]+/);
  if (embedded) {
    const embeddedDomain = extractDomain(embedded[0]);
    if (embeddedDomain && embeddedDomain !== sender.domain) {
      return `Display name shows ${embedded[0]} but message was sent from ${sender.domain}`;
    }
  }

  const phrases = nameVariants(name);
  const compactDomain = sender.domain.replace(/[^a-z0-9]/g, '');
  const brand = BRAND_NAMES.find((b) => phrases.has(b) && !compactDomain.includes(b));
  if (brand) {
    return `Display name "${sender.displayName}" references ${brand} but sender domain is ${sender.domain}`;
  }

  return null;
}

// Single words plus joined 2- and 3-word runs ("bank of america" -> "bankofamerica")
function nameVariants(name: string): Set<string> {
  const words = name.split(/[^a-z0-9]+/).filter(Boolean);
  const variants = new Set<string>();
  for (let i = 0; i < words.length; i++) {
    for (let len = 1; len <= 3 && i + len <= words.length; len++) {
      variants.add(words.slice(i, i + len).join(''));
    }
  }
  return variants;
}

function detectHeaderDomainMismatch(
  email: EmailMessage,
  sender: EmailAddress,
  header: string,
  label: string
): string | null {
  const raw = getHeader(email, header);
  if (!raw || !sender.domain) return null;

  const other = parseEmailAddress(raw);
  if (!other.domain || other.domain === sender.domain) return null;

  return `${label} domain (${other.domain}) differs from sender domain (${sender.domain})`;
}

function detectAuthenticationFailure(email: EmailMessage): string | null {
  const header = getHeader(email, 'authentication-results');
  if (!header) return null;

  const failed = [...header.matchAll(/\b(spf|dkim|dmarc)=fail\b/gi)].map((m) => m[1].toUpperCase());
  if (failed.length === 0) return null;

  return `Sender authentication failed (${[...new Set(failed)].join(', ')})`;
}

/**
 * First domain that imitates a known brand, described; null when none do
 */
export function detectLookalike(domains: string[]): string | null {
  for (const domain of domains) {
    if (!domain) continue;
    const reason = lookalikeReason(domain);
    if (reason) return reason;
  }
  return null;
}

function lookalikeReason(domain: string): string | null {
  const labels = domain.split('.');

  if (labels.some((label) => label.startsWith('xn--'))) {
    return `Internationalised domain ${domain} may imitate a familiar name`;
  }

  const base = registrableLabel(labels);

  // The brand's own domain under any suffix (paypal.com, amazon.co.uk, mail.dhl.de)
  if (BRAND_NAMES.includes(base)) {
    return null;
  }

  for (const brandDomain of BRAND_DOMAINS) {
    const brandBase = brandDomain.split('.')[0];

    if (isHomoglyph(base, brandBase)) {
      return `Domain ${domain} imitates ${brandDomain}`;
    }

    // Cousin domain: brand appears as its own token (paypal-secure.com, paypal.verify-login.net)
    const tokens = domain.split(/[.-]/);
    if (tokens.includes(brandBase)) {
      return `Domain ${domain} borrows the ${brandBase} name`;
    }
  }

  return null;
}

/**
 * Label just left of the public suffix: "amazon" in www.amazon.co.uk.
 * Knows single-label suffixes and the common ccTLD second levels (co.uk, com.au).
 */
function registrableLabel(labels: string[]): string {
  const count = labels.length;
  if (count < 2) return labels[0] ?? '';

  const tld = labels[count - 1];
  const second = labels[count - 2];
  const twoLabelSuffix = count >= 3 && tld.length === 2 && SECOND_LEVEL_SUFFIXES.has(second);

  return twoLabelSuffix ? labels[count - 3] : second;
}

function isHomoglyph(test: string, target: string): boolean {
  if (test.length !== target.length || test === target) return false;

  let differences = 0;
  for (let i = 0; i < test.length; i++) {
    if (test[i] === target[i]) continue;

    const lookalikes = HOMOGLYPHS[target[i]] ?? [];
    if (!lookalikes.includes(test[i])) return false;
    differences++;
  }

  return differences <= 2;
}
