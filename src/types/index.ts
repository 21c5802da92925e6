/**
 * Core type definitions for the persona runtime
 */

// ============================================
// Persona Types
// ============================================

/**
 * Sample user/assistant exchange included in the prompt as a few-shot example
 */
export interface PersonaExample {
  readonly user: string;
  readonly assistant: string;
}

/**
 * Generation parameters attached to a persona
 */
export interface ModelParams {
  /** Sampling temperature, 0..2 */
  readonly temperature: number;
  /** Maximum completion tokens, positive integer */
  readonly maxTokens: number;
  /** Nucleus sampling, 0..1 */
  readonly topP: number;
  /** Model id override; the backend default is used when absent */
  readonly model?: string;
  /** -2..2 */
  readonly frequencyPenalty?: number;
  /** -2..2 */
  readonly presencePenalty?: number;
}

/**
 * Validated persona. Immutable once loaded.
 */
export interface PersonaConfig {
  readonly name: string;
  readonly role: string;
  readonly description: string;
  readonly guidelines: string;
  readonly style: string;
  readonly examples: readonly PersonaExample[];
  readonly modelParams: ModelParams;
}

// ============================================
// Conversation Types
// ============================================

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp: Date;
}

// ============================================
// Prompt Types
// ============================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  readonly role: MessageRole;
  readonly content: string;
}

/**
 * Model-ready prompt for a single inference call
 */
export interface AssembledPrompt {
  /** Rendered persona instructions (also `messages[0].content`) */
  readonly systemPrompt: string;
  /** System message, few-shot examples, history, then the new user message */
  readonly messages: readonly PromptMessage[];
  /** Number of history turns removed to fit the token budget */
  readonly droppedTurns: number;
  /** Estimated token count of `messages` */
  readonly estimatedTokens: number;
}

// ============================================
// User Profile Types
// ============================================

/**
 * What one message revealed about the user. Empty fields mean nothing was found.
 */
export interface PreferenceUpdate {
  readonly topics: readonly string[];
  readonly preferences: Readonly<Record<string, string>>;
  readonly goals: readonly string[];
  readonly concerns: readonly string[];
  readonly context: Readonly<Record<string, string>>;
}

export interface UserProfileSnapshot extends PreferenceUpdate {
  /** Messages analysed so far */
  readonly interactionCount: number;
}

// ============================================
// Inference Types
// ============================================

export type BackendProvider = 'openai' | 'anthropic' | 'mock';

/**
 * Parameters for one completion, resolved from the persona's model params
 */
export interface GenerationParams {
  model: string;
  temperature: number;
  maxTokens: number;
  topP: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
}

/**
 * Request handed to a backend for a single attempt
 */
export interface BackendRequest {
  messages: readonly PromptMessage[];
  params: GenerationParams;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * What a backend returns for a successful attempt
 */
export interface BackendCompletion {
  text: string;
  model: string;
  finishReason?: string;
  usage?: TokenUsage;
}

/**
 * Result of InferenceClient.complete
 */
export interface CompletionResult extends BackendCompletion {
  /** Total attempts made, including the successful one */
  attempts: number;
}

/**
 * Contract every inference backend implements
 */
export interface InferenceBackend {
  readonly name: string;
  readonly provider: BackendProvider;
  /** Model used when the persona does not name one */
  readonly defaultModel: string;
  /**
   * Run one completion attempt. Must stop work when `signal` aborts.
   * Throws InferenceError subtypes (or raw SDK errors, which the client converts).
   */
  complete(request: BackendRequest, signal: AbortSignal): Promise<BackendCompletion>;
}

// ============================================
// Session Types
// ============================================

export type SessionState = 'idle' | 'assembling' | 'awaiting_completion' | 'appending';

export interface SessionSummary {
  id: string;
  personaName: string;
  turnCount: number;
  createdAt: Date;
  updatedAt: Date;
}
