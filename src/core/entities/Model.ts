import { ConversationTurn } from './Conversation.js';

/**
 * Model-related domain entities
 */
export interface InferenceSettings {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface ModelRequest {
  modelId: string;
  system?: string;
  messages: ConversationTurn[];
  inference: InferenceSettings;
}

export interface ModelReply {
  /** Text of the first content block, if the model produced one */
  text?: string;
  stopReason?: string;
}

export const TRANSLATION_INFERENCE: InferenceSettings = {
  maxTokens: 4000,
  temperature: 0.1,
  topP: 0.9,
};

export const CONTEXT_SEED_INFERENCE: InferenceSettings = {
  maxTokens: 100,
  temperature: 0.1,
  topP: 0.9,
};

// Room for a two-letter code and nothing else
export const DETECTION_INFERENCE: InferenceSettings = {
  maxTokens: 10,
  temperature: 0.1,
  topP: 0.9,
};

export const DEFAULT_MODEL_ID = 'us.anthropic.claude-sonnet-4-20250514-v1:0';
