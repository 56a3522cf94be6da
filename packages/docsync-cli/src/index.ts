/**
 * @docsync/cli
 * Command line for syncing and chatting with hosted assistants
 */

export * from './cli/types.js';
export * from './cli/utils.js';
export { createProgram, runCli, VERSION } from './cli/program.js';
export { parseFeedbackCommand, type FeedbackCommand } from './cli/commands/chat.js';
export { run as runAssistantsCommand } from './cli/commands/assistants.js';
export { run as runSyncCommand } from './cli/commands/sync.js';
export { run as runChatCommand } from './cli/commands/chat.js';
export { run as runScheduleCommand } from './cli/commands/schedule.js';
export * from './application/runtime.js';
export * from './application/scheduler.js';
