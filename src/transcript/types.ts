/**
 * Transcript reading: cursors, replies and the reader contract shared by the
 * JSONL log reader and the whole-document session reader.
 */

export interface Reply {
  text: string;
  /** Record id from the transcript, when it carries one. */
  originId?: string;
  /** sha256 of `text`, hex. */
  fingerprint: string;
}

/** Position in an append-only line log. */
export interface OffsetCursor {
  kind: 'offset';
  filePath?: string;
  /** Byte offset of the next unread line. */
  offset: number;
  lastModifiedMs: number;
  lastReplyId?: string;
  lastReplyFingerprint?: string;
}

/** Position in a JSON document that is rewritten as a whole. */
export interface CountCursor {
  kind: 'count';
  filePath?: string;
  /** Messages seen so far. null when the document could not be parsed at capture time. */
  messageCount: number | null;
  lastReplyId?: string;
  lastReplyFingerprint?: string;
  mtimeMs: number;
  size: number;
}

export type TranscriptCursor = OffsetCursor | CountCursor;

export interface PollOptions {
  timeoutMs: number;
  /** false: one pass, return immediately. */
  block: boolean;
}

export interface PollResult<C extends TranscriptCursor> {
  reply: Reply | null;
  cursor: C;
}

export interface TranscriptReader<C extends TranscriptCursor = TranscriptCursor> {
  readonly kind: C['kind'];
  /** Directory searched for transcripts. */
  readonly root: string;
  /** Transcript currently bound, rescanning for a newer one first. */
  currentPath(): string | undefined;
  setPreferredPath(path: string | undefined): void;
  /** Cursor that excludes everything already in the transcript. */
  captureState(): Promise<C>;
  waitForReply(cursor: C, timeoutMs: number): Promise<PollResult<C>>;
  tryGetReply(cursor: C): Promise<PollResult<C>>;
  poll(cursor: C, options: PollOptions): Promise<PollResult<C>>;
  /** Newest reply in the transcript, read without any cursor. */
  latestReply(): string | null;
}
