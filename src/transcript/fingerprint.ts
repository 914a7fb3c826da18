import { createHash } from 'crypto';
import type { Reply } from './types.js';

export function fingerprint(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

export function makeReply(text: string, originId?: string): Reply {
  return originId === undefined ? { text, fingerprint: fingerprint(text) } : { text, originId, fingerprint: fingerprint(text) };
}

/**
 * Two replies are one event when their fingerprints match and, if both carry
 * an id, their ids match too.
 */
export function isSameReply(
  reply: Pick<Reply, 'originId' | 'fingerprint'>,
  previousId: string | undefined,
  previousFingerprint: string | undefined,
): boolean {
  if (previousFingerprint === undefined || reply.fingerprint !== previousFingerprint) return false;
  if (reply.originId === undefined || previousId === undefined) return true;
  return reply.originId === previousId;
}
