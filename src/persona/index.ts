export {
  ConfigLoader,
  FileConfigSource,
  StringConfigSource,
  toPersonaDocument,
  type ConfigSource,
} from './config-loader.js';
export { renderSystemPrompt, CHARACTER_REMINDER } from './system-prompt.js';
export { PersonaRegistry, type PersonaLoadFailure, type PersonaLoadReport } from './registry.js';
