import { createHmac, timingSafeEqual } from 'crypto';
import { IGNORED_MINTS } from '../constants.js';
import { ValidationError } from '../errors.js';
import { isValidPublicKey } from '../utils/helpers.js';
import type { WebhookKind } from '../types.js';

// pool events name both sides of the pair
const MINT_FIELDS: Record<WebhookKind, readonly string[]> = {
  mint: ['mint'],
  pool: ['mint', 'tokenA', 'tokenB'],
  tx: ['mint'],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Helius delivers an object, an array of events, or the same JSON encoded a
 * second time as a string. Returns the list of event objects.
 */
export function parseWebhookBody(raw: string): Record<string, unknown>[] {
  if (raw.trim() === '') throw new ValidationError('Empty request body');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError('Invalid JSON body');
  }

  if (typeof parsed === 'string') {
    try {
      parsed = JSON.parse(parsed);
    } catch {
      throw new ValidationError('Body is a JSON string that does not contain JSON');
    }
  }

  if (Array.isArray(parsed)) return parsed.filter(isRecord);
  if (isRecord(parsed)) return [parsed];
  throw new ValidationError('Payload must be a JSON object or array');
}

/** Valid, de-duplicated mint addresses in first-seen order */
export function extractMints(events: readonly Record<string, unknown>[], kind: WebhookKind = 'mint'): string[] {
  const seen = new Set<string>();
  const add = (value: unknown) => {
    if (typeof value !== 'string') return;
    const mint = value.trim();
    if (IGNORED_MINTS.has(mint) || !isValidPublicKey(mint)) return;
    seen.add(mint);
  };

  for (const event of events) {
    for (const field of MINT_FIELDS[kind]) add(event[field]);
    if (Array.isArray(event.tokenTransfers)) {
      for (const transfer of event.tokenTransfers) {
        if (isRecord(transfer)) add(transfer.mint);
      }
    }
  }
  return [...seen];
}

/** HMAC-SHA256 of the raw body, hex; accepts an optional `sha256=` prefix. No secret means no check. */
export function verifySignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!secret) return true;
  if (!signature) return false;

  const provided = signature.startsWith('sha256=') ? signature.slice('sha256='.length) : signature;
  const expected = createHmac('sha256', secret).update(rawBody, 'utf8').digest('hex');

  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}
