/**
 * Deterministic Layer Tests
 * Rule catalog, score cap and purity of the feature extractor
 */

import { describe, it, expect } from 'vitest';
import { extractFeatures, calculateScore } from '@/lib/detection/deterministic';
import { DETECTION_RULES } from '@/lib/detection/rules';
import type { ThreatIndicator } from '@/lib/detection/types';
import {
  phishingEmail,
  benignEmail,
  saturatedEmail,
  createTestEmail,
} from '../fixtures/emails';

function ruleIds(indicators: ThreatIndicator[]): Array<string | undefined> {
  return indicators.map((indicator) => indicator.ruleId);
}

describe('Feature Extractor', () => {
  describe('Example messages', () => {
    it('should flag urgency and a display name mismatch on the credential lure', () => {
      const result = extractFeatures(phishingEmail);

      const linguistic = result.indicators.filter((i) => i.category === 'linguistic_manipulation');
      const technical = result.indicators.filter((i) => i.category === 'technical_indicator');

      expect(linguistic).toHaveLength(1);
      expect(linguistic[0].ruleId).toBe('urgency-language');
      expect(technical).toHaveLength(1);
      expect(technical[0].ruleId).toBe('display-name-mismatch');
      expect(result.score).toBeGreaterThan(0);
    });

    it('should report every matched rule in catalog order', () => {
      const result = extractFeatures(phishingEmail);

      expect(ruleIds(result.indicators)).toEqual([
        'urgency-language',
        'display-name-mismatch',
        'threat-language',
        'verification-request',
      ]);
      expect(result.score).toBeCloseTo(0.85, 10);
    });

    it('should describe matches with the matched text', () => {
      const result = extractFeatures(phishingEmail);

      expect(result.indicators[0]).toEqual({
        category: 'linguistic_manipulation',
        description: 'Urgency language: "URGENT"',
        source: 'rule_based',
        weight: 0.2,
        ruleId: 'urgency-language',
      });
      expect(result.indicators[1].description).toBe(
        'Display name "PayPal Security" references paypal but sender domain is secure-account-review.com'
      );
      expect(result.indicators[2].description).toBe('Fear-based threat: "will be suspended"');
    });

    it('should return zero and no indicators for a benign message', () => {
      const result = extractFeatures(benignEmail);

      expect(result.score).toBe(0);
      expect(result.indicators).toEqual([]);
    });
  });

  describe('Score cap', () => {
    it('should never exceed 1.0 however many rules match', () => {
      const result = extractFeatures(saturatedEmail);
      const rawTotal = result.indicators.reduce((sum, i) => sum + i.weight, 0);

      expect(rawTotal).toBeGreaterThan(1);
      expect(result.score).toBe(1);
    });

    it('should sum weights below the cap', () => {
      const indicators: ThreatIndicator[] = [
        { category: 'social_engineering', description: 'a', source: 'rule_based', weight: 0.25 },
        { category: 'technical_indicator', description: 'b', source: 'rule_based', weight: 0.5 },
      ];

      expect(calculateScore(indicators)).toBe(0.75);
      expect(calculateScore([])).toBe(0);
    });
  });

  describe('Matching semantics', () => {
    it('should match case-insensitively', () => {
      const result = extractFeatures(createTestEmail({ body: 'Please act NOW.' }));

      expect(result.indicators).toHaveLength(1);
      expect(result.indicators[0].description).toBe('Urgency language: "act NOW"');
    });

    it('should count overlapping rules independently', () => {
      const result = extractFeatures(createTestEmail({ body: 'Please verify your account login today.' }));

      expect(ruleIds(result.indicators)).toEqual(['verification-request', 'credential-request']);
      expect(result.score).toBeCloseTo(0.45, 10);
    });

    it('should emit one indicator per rule even when a phrase repeats', () => {
      const result = extractFeatures(createTestEmail({ body: 'Urgent. Urgent. URGENT.' }));

      expect(ruleIds(result.indicators)).toEqual(['urgency-language']);
    });

    it('should scan the subject as well as the body', () => {
      const result = extractFeatures(createTestEmail({ subject: 'Security alert', body: 'See attached.' }));

      expect(ruleIds(result.indicators)).toEqual(['threat-language']);
    });
  });

  describe('Structural rules', () => {
    it('should flag links to raw IP addresses', () => {
      const result = extractFeatures(createTestEmail({ body: 'Portal: http://192.168.10.5/home' }));

      expect(result.indicators).toEqual([
        {
          category: 'technical_indicator',
          description: 'Link points at a raw IP address (192.168.10.5)',
          source: 'rule_based',
          weight: 0.25,
          ruleId: 'ip-literal-url',
        },
      ]);
    });

    it('should flag homoglyph lookalike link domains', () => {
      const result = extractFeatures(createTestEmail({ body: 'Visit https://paypa1.com/secure' }));

      expect(result.indicators.map((i) => i.description)).toEqual(['Domain paypa1.com imitates paypal.com']);
    });

    it('should flag cousin domains that borrow a brand name', () => {
      const result = extractFeatures(
        createTestEmail({ body: 'Go to https://secure-paypal.com.verify-now.net/x' })
      );

      expect(result.indicators.map((i) => i.description)).toEqual([
        'Domain secure-paypal.com.verify-now.net borrows the paypal name',
      ]);
    });

    it('should not flag the genuine brand domain or its subdomains', () => {
      const result = extractFeatures(createTestEmail({ body: 'Help: https://www.paypal.com/help' }));

      expect(result.indicators).toEqual([]);
    });

    it.each(['Amazon <orders@amazon.co.uk>', 'DHL Express <noreply@dhl.de>', 'alerts@google.co.uk'])(
      'should not flag the brand sending from its own country domain (%s)',
      (sender) => {
        expect(extractFeatures(createTestEmail({ sender })).indicators).toEqual([]);
      }
    );

    it('should not flag links to a brand country site', () => {
      const result = extractFeatures(createTestEmail({ body: 'Track it at https://www.dhl.de/track' }));

      expect(result.indicators).toEqual([]);
    });

    it('should flag a brand name placed in front of another domain', () => {
      const result = extractFeatures(createTestEmail({ body: 'Open https://paypal.account-center.net/' }));

      expect(result.indicators.map((i) => i.description)).toEqual([
        'Domain paypal.account-center.net borrows the paypal name',
      ]);
    });

    it('should flag homoglyphs under a country suffix', () => {
      const result = extractFeatures(createTestEmail({ body: 'Visit https://paypa1.co.uk/account' }));

      expect(result.indicators.map((i) => i.description)).toEqual(['Domain paypa1.co.uk imitates paypal.com']);
    });

    it('should flag shortened links', () => {
      const result = extractFeatures(createTestEmail({ body: 'Details: https://bit.ly/3xYz' }));

      expect(ruleIds(result.indicators)).toEqual(['shortened-url']);
    });

    it('should flag an address embedded in the display name', () => {
      const result = extractFeatures(createTestEmail({ sender: '"service@paypal.com" <x@mailer.test>' }));

      expect(result.indicators.map((i) => i.description)).toEqual([
        'Display name shows service@paypal.com but message was sent from mailer.test',
      ]);
    });

    it('should flag multi-word brand names in the display name', () => {
      const result = extractFeatures(createTestEmail({ sender: 'Bank of America <notify@alerts-center.test>' }));

      expect(ruleIds(result.indicators)).toEqual(['display-name-mismatch']);
    });

    it('should not flag a brand display name on the brand domain', () => {
      const result = extractFeatures(createTestEmail({ sender: 'PayPal <service@paypal.com>' }));

      expect(result.indicators).toEqual([]);
    });

    it('should flag Reply-To and Return-Path domain mismatches', () => {
      const result = extractFeatures(
        createTestEmail({
          sender: 'Jo <jo@acme.test>',
          headers: {
            'Reply-To': 'payments@elsewhere.test',
            'Return-Path': '<bounce@bulk-sender.test>',
          },
        })
      );

      expect(result.indicators.map((i) => i.description)).toEqual([
        'Reply-To domain (elsewhere.test) differs from sender domain (acme.test)',
        'Return-Path domain (bulk-sender.test) differs from sender domain (acme.test)',
      ]);
    });

    it('should flag failed sender authentication', () => {
      const result = extractFeatures(
        createTestEmail({
          headers: {
            'Authentication-Results': 'mx.test; spf=fail smtp.mailfrom=x.test; dkim=pass; dmarc=fail',
          },
        })
      );

      expect(result.indicators.map((i) => i.description)).toEqual(['Sender authentication failed (SPF, DMARC)']);
    });

    it('should ignore passing authentication results', () => {
      const result = extractFeatures(
        createTestEmail({ headers: { 'authentication-results': 'mx.test; spf=pass; dkim=pass; dmarc=pass' } })
      );

      expect(result.indicators).toEqual([]);
    });
  });

  describe('Input handling', () => {
    it('should read missing fields as empty text', () => {
      const malformed = JSON.parse('{"subject": "Act now", "sender": null}');

      const result = extractFeatures(malformed);

      expect(ruleIds(result.indicators)).toEqual(['urgency-language']);
      expect(result.score).toBe(0.2);
    });

    it('should handle a completely empty message', () => {
      const result = extractFeatures({ subject: '', body: '', sender: '' });

      expect(result).toEqual({ score: 0, indicators: [] });
    });
  });

  describe('Properties', () => {
    it('should be idempotent', () => {
      const first = extractFeatures(phishingEmail);
      const second = extractFeatures(phishingEmail);

      expect(second).toEqual(first);
    });

    it('should keep every score within [0, 1]', () => {
      for (const email of [phishingEmail, benignEmail, saturatedEmail]) {
        const { score } = extractFeatures(email);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    });

    it('should never lower the score when a trigger phrase is added', () => {
      const triggers = [
        'Act now.',
        'This offer expires today.',
        'Security alert.',
        'Confirm your identity.',
        'Enter your password.',
        'Send a wire transfer.',
        'http://172.16.0.9/x',
      ];

      let body = benignEmail.body;
      let previous = extractFeatures(benignEmail).score;

      for (const trigger of triggers) {
        body = `${body} ${trigger}`;
        const score = extractFeatures({ ...benignEmail, body }).score;
        expect(score).toBeGreaterThanOrEqual(previous);
        previous = score;
      }

      expect(previous).toBe(1);
    });

    it('should give every rule a weight within [0, 1] and a unique id', () => {
      const ids = new Set(DETECTION_RULES.map((rule) => rule.id));

      expect(ids.size).toBe(DETECTION_RULES.length);
      for (const rule of DETECTION_RULES) {
        expect(rule.weight).toBeGreaterThan(0);
        expect(rule.weight).toBeLessThanOrEqual(1);
      }
    });
  });
});
