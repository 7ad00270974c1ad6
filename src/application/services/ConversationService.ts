import {
  ConversationTurn,
  Transcript,
  TranscriptStats,
  TranscriptTask,
} from '../../core/entities/Conversation.js';

/**
 * Service for managing the per-task transcripts of one translation session.
 *
 * Transcripts are append-only and never trimmed: every translate request
 * resends the whole history, so cost and latency grow with each call.
 * Use clearHistory() to start over.
 */
export class ConversationService {
  private transcripts: Map<TranscriptTask, Transcript> = new Map();

  /**
   * Set the fixed instruction for a task
   */
  setInstruction(task: TranscriptTask, instruction: string): void {
    this.getTranscript(task).instruction = instruction;
  }

  getInstruction(task: TranscriptTask): string | undefined {
    return this.getTranscript(task).instruction;
  }

  /**
   * Add a user turn to a transcript
   */
  addUserMessage(task: TranscriptTask, content: string): void {
    this.getTranscript(task).turns.push({ role: 'user', content });
  }

  /**
   * Add an assistant turn to a transcript
   */
  addAssistantMessage(task: TranscriptTask, content: string): void {
    this.getTranscript(task).turns.push({ role: 'assistant', content });
  }

  /**
   * Remove the most recent turn, returning it
   */
  removeLastMessage(task: TranscriptTask): ConversationTurn | undefined {
    return this.getTranscript(task).turns.pop();
  }

  /**
   * Snapshot of the turns for a task, safe to hand to a request
   */
  getHistory(task: TranscriptTask): ConversationTurn[] {
    return this.getTranscript(task).turns.map((turn) => ({ ...turn }));
  }

  /**
   * Drop the instruction and all turns of a task
   */
  clearHistory(task: TranscriptTask): void {
    this.transcripts.set(task, { turns: [] });
  }

  getStats(task: TranscriptTask): TranscriptStats {
    const transcript = this.getTranscript(task);
    return {
      task,
      turns: transcript.turns.length,
      characters: transcript.turns.reduce((sum, turn) => sum + turn.content.length, 0),
      hasInstruction: transcript.instruction !== undefined,
    };
  }

  private getTranscript(task: TranscriptTask): Transcript {
    let transcript = this.transcripts.get(task);
    if (!transcript) {
      transcript = { turns: [] };
      this.transcripts.set(task, transcript);
    }
    return transcript;
  }
}
