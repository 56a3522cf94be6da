/**
 * @module @docsync/engine/chat/conversation-session
 * One conversation thread with an assistant, streamed as typed events
 */

import { SilentLogger, wrapError, type Logger } from '@docsync/core';
import type { AssistantPlatform, ConversationEvent } from '../platform/types.js';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export class ConversationSession {
  private threadId: string | null = null;
  private readonly history: ChatMessage[] = [];

  constructor(
    private readonly platform: AssistantPlatform,
    readonly assistantId: string,
    private readonly logger: Logger = new SilentLogger(),
  ) {}

  get id(): string | null {
    return this.threadId;
  }

  get messages(): readonly ChatMessage[] {
    return this.history;
  }

  async start(): Promise<string> {
    if (!this.threadId) {
      const thread = await this.platform.conversations.create();
      this.threadId = thread.id;
      this.logger.info(`New thread created with ID: ${thread.id}`);
    }
    return this.threadId;
  }

  /**
   * Post a user message and stream the assistant's answer. The final event is
   * `done` with the full text; the answer joins the history only then.
   */
  async *send(text: string, options: SendOptions = {}): AsyncGenerator<ConversationEvent> {
    const threadId = await this.start();
    this.logger.info(`User input: ${text}`);
    this.history.push({ role: 'user', content: text });

    let answer = '';
    try {
      await this.platform.conversations.postMessage(threadId, text);
      for await (const event of this.platform.conversations.streamRun(threadId, this.assistantId, options.signal)) {
        if (event.type === 'text-delta') {
          answer += event.value;
        }
        yield event;
      }
    } catch (error) {
      if (options.signal?.aborted) {
        this.logger.info('Response stream cancelled');
        return;
      }
      this.logger.error(`Run on thread ${threadId} failed`, { error });
      throw wrapError(error, 'DOCSYNC_CONVERSATION_FAILED');
    }

    this.history.push({ role: 'assistant', content: answer });
    this.logger.info(`Assistant response: ${answer}`);
    yield { type: 'done', text: answer };
  }
}
