/**
 * Conversation domain entities
 */
export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * The two task types a session keeps apart, so translation context never
 * leaks into language detection.
 */
export type TranscriptTask = 'translation' | 'detection';

export interface Transcript {
  /** Fixed instruction for the task, sent as the system prompt once set */
  instruction?: string;
  /** Replayed verbatim, in order, on every request that uses this transcript */
  turns: ConversationTurn[];
}

export interface TranscriptStats {
  task: TranscriptTask;
  turns: number;
  characters: number;
  hasInstruction: boolean;
}
