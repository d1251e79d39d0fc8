/**
 * Content fingerprints for cache addressing.
 *
 * A fingerprint is the sha256 of a versioned, NUL-separated tuple:
 *   v1 \0 sha256(dataset bytes) \0 normalized question \0 agent id | '*'
 *
 * Questions are normalized before hashing (Unicode NFKC, trimmed, lowercased,
 * internal whitespace collapsed), so "Find  TRENDS " and "find trends" share
 * cache entries. Punctuation is kept: "trends?" and "trends" differ.
 */

import { createHash } from 'node:crypto';

export const FINGERPRINT_VERSION = 'v1';

/** Stands in for the agent slot in whole-run fingerprints. */
const ANY_AGENT = '*';

export function normalizeQuestion(question: string): string {
  return question.normalize('NFKC').trim().toLowerCase().replace(/\s+/g, ' ');
}

export function digestDataset(bytes: Uint8Array | string): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Fingerprint from an already computed dataset digest. Datasets are hashed
 * once at upload; runs reuse the digest instead of rereading the file.
 */
export function fingerprintFromDigest(datasetDigest: string, question: string, agentId?: string): string {
  return createHash('sha256')
    .update([FINGERPRINT_VERSION, datasetDigest, normalizeQuestion(question), agentId ?? ANY_AGENT].join('\0'))
    .digest('hex');
}

export function fingerprint(datasetBytes: Uint8Array | string, question: string, agentId?: string): string {
  return fingerprintFromDigest(digestDataset(datasetBytes), question, agentId);
}
