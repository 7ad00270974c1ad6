import { IModelClient, ProviderErrorMapper } from '../../core/interfaces/IModelClient.js';
import {
  CONTEXT_SEED_INFERENCE,
  DETECTION_INFERENCE,
  TRANSLATION_INFERENCE,
} from '../../core/entities/Model.js';
import { TranscriptStats } from '../../core/entities/Conversation.js';
import { ConfigurationError } from '../../core/errors/TranslatorErrors.js';
import { DEFAULT_LANGUAGE_TABLE, LanguageTable } from '../../core/languages/LanguageTable.js';
import {
  DETECTION_INSTRUCTION,
  TRANSLATION_ACK_FALLBACK,
  TRANSLATION_ACK_REQUEST,
  TRANSLATION_INSTRUCTION,
  buildDetectionPrompt,
  buildTranslationPrompt,
} from '../../core/templates/TranslationPrompts.js';
import { Logger, errorFields, silentLogger } from '../../utils/logger.js';
import { ConversationService } from './ConversationService.js';

export const DEFAULT_LANGUAGE_CODE = 'en';

const LANGUAGE_CODE_PATTERN = /^[a-z]{2}$/;

export interface TranslationServiceOptions {
  modelId: string;
  mapError: ProviderErrorMapper;
  languages?: LanguageTable;
  logger?: Logger;
}

export interface SessionStatus {
  modelId: string;
  disposed: boolean;
  translationContextInitialized: boolean;
  detectionContextInitialized: boolean;
  translation: TranscriptStats;
  detection: TranscriptStats;
}

/**
 * One translation session: two transcripts, a fixed model and the remote
 * connection that serves them.
 *
 * Not safe for concurrent use. At most one translate and one detect call may
 * be in flight per session; overlapping calls interleave transcript turns.
 */
export class TranslationService {
  private readonly modelId: string;
  private readonly mapError: ProviderErrorMapper;
  private readonly languages: LanguageTable;
  private readonly logger: Logger;
  private translationContextInitialized = false;
  private detectionContextInitialized = false;
  private disposed = false;

  constructor(
    private modelClient: IModelClient,
    private conversationService: ConversationService,
    options: TranslationServiceOptions
  ) {
    this.modelId = options.modelId;
    this.mapError = options.mapError;
    this.languages = options.languages ?? DEFAULT_LANGUAGE_TABLE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Translate one UI string. Empty or whitespace-only text comes back
   * unchanged without a remote call. Faults are thrown as TranslatorError,
   * and the prompt of a failed call is taken back out of the transcript so
   * turns keep alternating for the next call.
   */
  async translate(text: string, targetLanguage: string, sourceLanguage?: string): Promise<string> {
    if (text.trim().length === 0) {
      return text;
    }

    this.assertNotDisposed();

    let pendingPrompt = false;
    try {
      await this.ensureTranslationContext();

      const prompt = buildTranslationPrompt(text, targetLanguage, sourceLanguage, this.languages);
      this.conversationService.addUserMessage('translation', prompt);
      pendingPrompt = true;

      const reply = await this.modelClient.converse({
        modelId: this.modelId,
        system: this.conversationService.getInstruction('translation'),
        messages: this.conversationService.getHistory('translation'),
        inference: TRANSLATION_INFERENCE,
      });

      const translated = reply.text?.trim() || text;
      this.conversationService.addAssistantMessage('translation', translated);
      pendingPrompt = false;

      this.logger.debug('String translated', {
        target_language: targetLanguage,
        source_language: sourceLanguage,
        transcript_turns: this.conversationService.getStats('translation').turns,
      });

      return translated;
    } catch (error) {
      if (pendingPrompt) {
        this.conversationService.removeLastMessage('translation');
      }
      throw this.mapError(error, this.modelId);
    }
  }

  /**
   * Detect the language of a string. Never throws: empty input and every
   * failure yield the default code.
   */
  async detectLanguage(text: string): Promise<string> {
    if (text.trim().length === 0) {
      return DEFAULT_LANGUAGE_CODE;
    }

    try {
      this.assertNotDisposed();
      this.ensureDetectionContext();

      const reply = await this.modelClient.converse({
        modelId: this.modelId,
        system: this.conversationService.getInstruction('detection'),
        messages: [{ role: 'user', content: buildDetectionPrompt(text) }],
        inference: DETECTION_INFERENCE,
      });

      const code = reply.text?.trim().toLowerCase() ?? '';
      if (!LANGUAGE_CODE_PATTERN.test(code)) {
        this.logger.debug('Unrecognized detection reply, using default', { reply: code });
        return DEFAULT_LANGUAGE_CODE;
      }
      return code;
    } catch (error) {
      this.logger.debug('Language detection failed, using default', errorFields(error));
      return DEFAULT_LANGUAGE_CODE;
    }
  }

  /**
   * Seed the translation transcript once per session with the translator
   * instruction and one acknowledgment round trip.
   *
   * A failed round trip removes the acknowledgment request and leaves the
   * context uninitialized, so the next translate call seeds again before
   * doing its own work.
   */
  async ensureTranslationContext(): Promise<void> {
    if (this.translationContextInitialized) {
      return;
    }

    this.conversationService.setInstruction('translation', TRANSLATION_INSTRUCTION);
    this.conversationService.addUserMessage('translation', TRANSLATION_ACK_REQUEST);

    try {
      const reply = await this.modelClient.converse({
        modelId: this.modelId,
        system: TRANSLATION_INSTRUCTION,
        messages: this.conversationService.getHistory('translation'),
        inference: CONTEXT_SEED_INFERENCE,
      });

      this.conversationService.addAssistantMessage('translation', reply.text || TRANSLATION_ACK_FALLBACK);
      this.translationContextInitialized = true;
    } catch (error) {
      this.conversationService.removeLastMessage('translation');
      this.logger.warn('Translation context seeding failed; will retry on next call', errorFields(error));
    }
  }

  /**
   * Store the detection instruction on first use. No round trip.
   */
  ensureDetectionContext(): void {
    if (this.detectionContextInitialized) {
      return;
    }

    this.conversationService.setInstruction('detection', DETECTION_INSTRUCTION);
    this.detectionContextInitialized = true;
  }

  /**
   * Forget the translation transcript; the next translate call seeds again
   */
  resetTranslationContext(): void {
    this.conversationService.clearHistory('translation');
    this.translationContextInitialized = false;
  }

  getStatus(): SessionStatus {
    return {
      modelId: this.modelId,
      disposed: this.disposed,
      translationContextInitialized: this.translationContextInitialized,
      detectionContextInitialized: this.detectionContextInitialized,
      translation: this.conversationService.getStats('translation'),
      detection: this.conversationService.getStats('detection'),
    };
  }

  /**
   * Release the remote connection. Safe to call more than once.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.modelClient.dispose();
    this.logger.debug('Translation session disposed');
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ConfigurationError('Translation session has been disposed. Open a new session.');
    }
  }
}
