export { Mutex } from './mutex.js';
export { ConversationLog, createTurn } from './conversation-log.js';
export {
  SessionRunner,
  type SessionRunnerOptions,
  type StateChangeListener,
} from './session-runner.js';
export { SessionManager, type SessionManagerOptions } from './session-manager.js';
