#!/usr/bin/env npx tsx

/**
 * Analyze an email file from the command line
 * Run with: npx tsx scripts/analyze-email.ts path/to/message.eml
 *
 * The file holds "Name: value" header lines, a blank line, then the body.
 * Requires ANTHROPIC_API_KEY; PHISH_* variables tune the model call.
 */

import { readFileSync } from 'fs';
import { analyzeEmail, createModelCallFromConfig, type EmailMessage } from '../lib/detection';
import { loadDetectionConfig } from '../lib/config/detection';
import { loggers } from '../lib/logging/logger';

export function parseEmailFile(raw: string): EmailMessage {
  const normalized = raw.replace(/\r\n/g, '\n');
  const separator = normalized.indexOf('\n\n');
  const headerBlock = separator === -1 ? normalized : normalized.slice(0, separator);
  const body = separator === -1 ? '' : normalized.slice(separator + 2);

  const headers: Record<string, string> = {};
  let lastName: string | null = null;

  for (const line of headerBlock.split('\n')) {
    // Folded continuation line
    if (/^\s/.test(line) && lastName) {
      headers[lastName] += ` ${line.trim()}`;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    lastName = line.slice(0, colon).trim().toLowerCase();
    headers[lastName] = line.slice(colon + 1).trim();
  }

  return {
    subject: headers['subject'] ?? '',
    sender: headers['from'] ?? '',
    body,
    headers,
  };
}

async function main(): Promise<void> {
  const path = process.argv[2];
  if (!path) {
    console.error('Usage: npx tsx scripts/analyze-email.ts <email-file>');
    process.exit(1);
  }

  const config = loadDetectionConfig();
  const email = parseEmailFile(readFileSync(path, 'utf8'));

  const report = await analyzeEmail(email, createModelCallFromConfig(config), config.llmTimeoutMs, {
    retry: { maxAttempts: config.llmMaxAttempts, baseDelayMs: config.llmRetryBaseDelayMs },
    maxBodyChars: config.maxBodyChars,
  });

  console.log(JSON.stringify(report, null, 2));
}

if (process.argv[1]?.endsWith('analyze-email.ts')) {
  main().catch((error: unknown) => {
    loggers.cli.error('Analysis failed', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
}
