/**
 * docsync chat <key>: terminal conversation with an assistant
 */

import path from 'node:path';
import readline from 'node:readline';
import { FeedbackStore, getAssistant, type FeedbackScore, type Logger } from '@docsync/core';
import { ConversationSession } from '@docsync/engine';
import { createRuntime } from '../../application/runtime.js';
import type { CommandContext, CommandModule } from '../types.js';
import { box, colors, reportError, safeSymbols } from '../utils.js';

const PROMPT = '> ';
const FEEDBACK_PATTERN = /^\/(up|down)(?:\s+(.+))?$/;

export interface FeedbackCommand {
  score: FeedbackScore;
  text?: string;
}

/**
 * `/up [comment]` or `/down [comment]`; null for anything else
 */
export function parseFeedbackCommand(line: string): FeedbackCommand | null {
  const match = FEEDBACK_PATTERN.exec(line.trim());
  if (!match) {
    return null;
  }
  const score: FeedbackScore = match[1] === 'up' ? 'up' : 'down';
  const text = match[2]?.trim();
  return text ? { score, text } : { score };
}

function lastAnswerIndex(session: ConversationSession): number {
  for (let i = session.messages.length - 1; i >= 0; i--) {
    if (session.messages[i]?.role === 'assistant') {
      return i;
    }
  }
  return -1;
}

async function streamAnswer(ctx: CommandContext, session: ConversationSession, text: string): Promise<void> {
  for await (const event of session.send(text, { signal: ctx.signal })) {
    switch (event.type) {
      case 'text-delta':
        ctx.presenter.write(event.value);
        break;
      case 'tool-call-created':
        ctx.presenter.write(`\n${colors.dim(event.toolType)}\n`);
        break;
      case 'tool-call-delta':
        if (event.input) {
          ctx.presenter.write(event.input);
        }
        for (const logs of event.logs ?? []) {
          ctx.presenter.write(`\n${logs}`);
        }
        break;
      case 'done':
        ctx.presenter.write('\n');
        break;
    }
  }
}

async function recordFeedback(
  ctx: CommandContext,
  store: FeedbackStore,
  session: ConversationSession,
  assistantKey: string,
  command: FeedbackCommand,
  logger: Logger,
): Promise<void> {
  const messageIndex = lastAnswerIndex(session);
  if (messageIndex < 0 || !session.id) {
    ctx.presenter.warn(`${safeSymbols.warning} Nothing to rate yet`);
    return;
  }

  logger.info(`Received feedback - Score: ${command.score}, Text: ${command.text ?? ''}`);
  await store.save({
    assistantKey,
    threadId: session.id,
    messageIndex,
    score: command.score,
    ...(command.text ? { text: command.text } : {}),
  });
  ctx.presenter.info(`${safeSymbols.check} Feedback saved`);
}

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const key = argv[0];
  if (!key) {
    ctx.presenter.error(`${safeSymbols.cross} Missing assistant key`);
    return 2;
  }

  try {
    const runtime = await createRuntime(ctx, flags, 'chat');
    const assistant = getAssistant(runtime.config, key);
    const feedback = runtime.config.feedback;
    const store = new FeedbackStore({
      basePath: path.resolve(runtime.root, feedback.dir),
      maxRecordsPerFile: feedback.maxRecordsPerFile,
      maxFiles: feedback.maxFiles,
    });
    const session = new ConversationSession(runtime.platform, assistant.id, runtime.logger);

    ctx.presenter.write(
      `${box(`${assistant.icon} ${assistant.title}`, [
        ...(assistant.description ? [assistant.description, ''] : []),
        colors.dim('/up or /down [comment] rates the last answer, /exit quits'),
      ])}\n${PROMPT}`,
    );

    const rl = readline.createInterface({ input: ctx.stdin, terminal: false });
    try {
      for await (const line of rl) {
        const text = line.trim();
        if (text === '/exit') {
          break;
        }

        if (text) {
          const command = parseFeedbackCommand(text);
          if (command) {
            await recordFeedback(ctx, store, session, key, command, runtime.logger);
          } else {
            try {
              await streamAnswer(ctx, session, text);
            } catch (error) {
              reportError(ctx, error);
            }
          }
        }

        if (ctx.signal?.aborted) {
          break;
        }
        ctx.presenter.write(PROMPT);
      }
    } finally {
      rl.close();
    }

    return 0;
  } catch (error) {
    return reportError(ctx, error);
  }
};
