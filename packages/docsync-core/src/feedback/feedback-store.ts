/**
 * @module @docsync/core/feedback
 * Thumbs feedback on assistant answers
 */

import { FileRotationStore, type FileRotationOptions } from './file-rotation.js';

export type FeedbackScore = 'up' | 'down';

export interface FeedbackRecord {
  assistantKey: string;
  threadId: string;
  /** Position of the rated answer in the session history */
  messageIndex: number;
  score: FeedbackScore;
  text?: string;
  createdAt: string;
}

export type FeedbackInput = Omit<FeedbackRecord, 'createdAt'>;

export class FeedbackStore extends FileRotationStore<FeedbackRecord> {
  constructor(options: FileRotationOptions = {}) {
    super({ filePrefix: 'feedback-', ...options });
  }

  async save(input: FeedbackInput): Promise<FeedbackRecord> {
    const record: FeedbackRecord = {
      ...input,
      createdAt: new Date(this.now()).toISOString(),
    };
    await this.appendRecord(record);
    return record;
  }

  async list(filter: { assistantKey?: string; threadId?: string } = {}, limit?: number): Promise<FeedbackRecord[]> {
    return this.readRecords(
      (record) =>
        (filter.assistantKey === undefined || record.assistantKey === filter.assistantKey) &&
        (filter.threadId === undefined || record.threadId === filter.threadId),
      limit,
    );
  }
}
