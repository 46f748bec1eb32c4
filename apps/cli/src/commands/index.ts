/**
 * Commands exports
 */

export { configCommand } from './config.js';
export { queryCommand } from './query.js';
export { statusCommand } from './status.js';
export { replCommand, promptLineSource, streamLineSource, PROMPT, type LineSource } from './repl.js';
export {
  connectSession,
  resolveSessionOptions,
  type CommandContext,
  type GlobalOptions,
  type SessionOpener,
} from './shared.js';
