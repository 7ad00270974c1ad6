/**
 * Tests for the translation session: context seeding, transcript growth,
 * prompt construction and the translate/detect error asymmetry
 */

import {
  AccessDeniedException,
  InternalServerException,
  ServiceUnavailableException,
  ThrottlingException,
  ValidationException,
} from '@aws-sdk/client-bedrock-runtime';
import { ConversationService } from '../src/application/services/ConversationService.js';
import { TranslationService } from '../src/application/services/TranslationService.js';
import {
  CONTEXT_SEED_INFERENCE,
  DETECTION_INFERENCE,
  TRANSLATION_INFERENCE,
} from '../src/core/entities/Model.js';
import {
  AccessDeniedError,
  ConfigurationError,
  RateLimitedError,
  ServiceError,
} from '../src/core/errors/TranslatorErrors.js';
import {
  DETECTION_INSTRUCTION,
  TRANSLATION_ACK_FALLBACK,
  TRANSLATION_ACK_REQUEST,
  TRANSLATION_INSTRUCTION,
} from '../src/core/templates/TranslationPrompts.js';
import { mapBedrockError } from '../src/infrastructure/bedrock/BedrockErrorMapper.js';
import { FakeModelClient } from './fakes.js';

const MODEL_ID = 'test-model';

function createSession(client: FakeModelClient) {
  const conversations = new ConversationService();
  const service = new TranslationService(client, conversations, {
    modelId: MODEL_ID,
    mapError: mapBedrockError,
  });
  return { service, conversations };
}

const throttled = () => new ThrottlingException({ message: 'Too many requests', $metadata: {} });

describe('TranslationService', () => {
  describe('translate - input handling', () => {
    it('should return empty and whitespace-only text unchanged without a remote call', async () => {
      const client = new FakeModelClient();
      const { service } = createSession(client);

      expect(await service.translate('', 'fr')).toBe('');
      expect(await service.translate('   ', 'fr')).toBe('   ');
      expect(await service.translate('\n\t', 'fr', 'en')).toBe('\n\t');
      expect(client.requests).toHaveLength(0);
    });
  });

  describe('translate - context seeding', () => {
    it('should seed the context with one round trip before the first translation', async () => {
      const client = new FakeModelClient().replyWith('Understood.', 'Enregistrer');
      const { service, conversations } = createSession(client);

      const result = await service.translate('Save', 'fr');

      expect(result).toBe('Enregistrer');
      expect(client.requests).toHaveLength(2);
      expect(client.requests[0]).toEqual({
        modelId: MODEL_ID,
        system: TRANSLATION_INSTRUCTION,
        messages: [{ role: 'user', content: TRANSLATION_ACK_REQUEST }],
        inference: CONTEXT_SEED_INFERENCE,
      });
      expect(client.requests[1]).toEqual({
        modelId: MODEL_ID,
        system: TRANSLATION_INSTRUCTION,
        messages: [
          { role: 'user', content: TRANSLATION_ACK_REQUEST },
          { role: 'assistant', content: 'Understood.' },
          { role: 'user', content: 'Translate to French: "Save"' },
        ],
        inference: TRANSLATION_INFERENCE,
      });
      expect(conversations.getHistory('translation')).toHaveLength(4);
    });

    it('should grow the transcript by two turns per later call without seeding again', async () => {
      const client = new FakeModelClient().replyWith('Understood.', 'Enregistrer', 'Ouvrir', 'Fermer');
      const { service, conversations } = createSession(client);

      await service.translate('Save', 'fr');
      await service.translate('Open', 'fr');
      await service.translate('Close', 'fr');

      expect(client.requests).toHaveLength(4);
      expect(conversations.getHistory('translation')).toHaveLength(4 + 2 * 2);
      expect(client.requests[3].messages).toHaveLength(7);
      expect(client.requests[3].messages[6]).toEqual({ role: 'user', content: 'Translate to French: "Close"' });
    });

    it('should use the fallback acknowledgment when the seeding reply is empty', async () => {
      const client = new FakeModelClient().replyWith('', 'Sauver');
      const { service, conversations } = createSession(client);

      await service.translate('Save', 'fr');

      expect(conversations.getHistory('translation')[1]).toEqual({
        role: 'assistant',
        content: TRANSLATION_ACK_FALLBACK,
      });
    });

    it('should roll back the seeding turn when seeding fails and still translate', async () => {
      const client = new FakeModelClient().failWith(throttled()).replyWith('Guardar');
      const { service, conversations } = createSession(client);

      const result = await service.translate('Save', 'es', 'en');

      expect(result).toBe('Guardar');
      expect(conversations.getHistory('translation')).toEqual([
        { role: 'user', content: 'Translate from English to Spanish: "Save"' },
        { role: 'assistant', content: 'Guardar' },
      ]);
      expect(service.getStatus().translationContextInitialized).toBe(false);
    });

    it('should leave no seeding turns behind when both seeding and translation fail', async () => {
      const client = new FakeModelClient().alwaysFailWith(throttled());
      const { service, conversations } = createSession(client);

      await expect(service.translate('Save', 'fr')).rejects.toBeInstanceOf(RateLimitedError);

      expect(conversations.getHistory('translation')).toEqual([]);
    });

    it('should attempt seeding again on the call after a failed seeding', async () => {
      const client = new FakeModelClient().failWith(throttled()).replyWith('Guardar', 'Understood.', 'Abrir');
      const { service } = createSession(client);

      await service.translate('Save', 'es');
      const result = await service.translate('Open', 'es');

      expect(result).toBe('Abrir');
      expect(client.requests).toHaveLength(4);
      expect(client.requests[2].inference).toEqual(CONTEXT_SEED_INFERENCE);
      expect(service.getStatus().translationContextInitialized).toBe(true);
    });

    it('should seed again after the translation context is reset', async () => {
      const client = new FakeModelClient().replyWith('Understood.', 'Enregistrer', 'Understood.', 'Ouvrir');
      const { service, conversations } = createSession(client);

      await service.translate('Save', 'fr');
      service.resetTranslationContext();
      expect(conversations.getHistory('translation')).toHaveLength(0);

      await service.translate('Open', 'fr');

      expect(client.requests).toHaveLength(4);
      expect(client.requests[2].messages).toEqual([{ role: 'user', content: TRANSLATION_ACK_REQUEST }]);
      expect(conversations.getHistory('translation')).toHaveLength(4);
    });
  });

  describe('translate - replies', () => {
    it('should trim the reply', async () => {
      const client = new FakeModelClient().replyWith('Understood.', '  Speichern \n');
      const { service } = createSession(client);

      expect(await service.translate('Save', 'de')).toBe('Speichern');
    });

    it('should return the input when the reply is blank or missing', async () => {
      const client = new FakeModelClient().replyWith('Understood.', '   ', undefined);
      const { service, conversations } = createSession(client);

      expect(await service.translate('Save', 'fr')).toBe('Save');
      expect(await service.translate('Open', 'fr')).toBe('Open');

      const history = conversations.getHistory('translation');
      expect(history[3]).toEqual({ role: 'assistant', content: 'Save' });
      expect(history[5]).toEqual({ role: 'assistant', content: 'Open' });
    });

    it('should pass unknown language codes through to the prompt', async () => {
      const client = new FakeModelClient().replyWith('Understood.', 'Save');
      const { service } = createSession(client);

      await service.translate('Save', 'xx');

      expect(client.requests[1].messages[2].content).toBe('Translate to xx: "Save"');
    });
  });

  describe('translate - errors', () => {
    it('should take back the prompt of a failed call so a retry succeeds', async () => {
      const client = new FakeModelClient()
        .replyWith('Understood.')
        .failWith(throttled())
        .replyWith('Ouvrir', 'Fermer');
      const { service, conversations } = createSession(client);

      await expect(service.translate('Open', 'fr')).rejects.toBeInstanceOf(RateLimitedError);
      expect(conversations.getHistory('translation')).toEqual([
        { role: 'user', content: TRANSLATION_ACK_REQUEST },
        { role: 'assistant', content: 'Understood.' },
      ]);

      expect(await service.translate('Open', 'fr')).toBe('Ouvrir');
      expect(client.requests[2].messages).toEqual([
        { role: 'user', content: TRANSLATION_ACK_REQUEST },
        { role: 'assistant', content: 'Understood.' },
        { role: 'user', content: 'Translate to French: "Open"' },
      ]);

      expect(await service.translate('Close', 'fr')).toBe('Fermer');
      const roles = conversations.getHistory('translation').map((turn) => turn.role);
      expect(roles).toEqual(['user', 'assistant', 'user', 'assistant', 'user', 'assistant']);
    });

    it('should map provider faults to typed errors and keep the cause', async () => {
      const fault = new AccessDeniedException({ message: 'not authorized', $metadata: {} });
      const client = new FakeModelClient().replyWith('Understood.').failWith(fault);
      const { service } = createSession(client);

      const error = await service.translate('Save', 'fr').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AccessDeniedError);
      expect(error instanceof Error && error.cause).toBe(fault);
    });

    it('should map unexpected failures to an UnknownError service error', async () => {
      const client = new FakeModelClient().replyWith('Understood.').failWith(new Error('boom'));
      const { service } = createSession(client);

      const error = await service.translate('Save', 'fr').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error instanceof ServiceError && error.errorCode).toBe('UnknownError');
      expect(error instanceof Error && error.message).toBe('Unexpected error during translation: boom');
    });
  });

  describe('detectLanguage', () => {
    it('should return the default code for empty text without a remote call', async () => {
      const client = new FakeModelClient();
      const { service } = createSession(client);

      expect(await service.detectLanguage('')).toBe('en');
      expect(await service.detectLanguage('   ')).toBe('en');
      expect(client.requests).toHaveLength(0);
    });

    it('should send a one-shot request and normalize the reply', async () => {
      const client = new FakeModelClient().replyWith(' FR \n');
      const { service, conversations } = createSession(client);

      expect(await service.detectLanguage('Bonjour')).toBe('fr');
      expect(client.requests).toEqual([
        {
          modelId: MODEL_ID,
          system: DETECTION_INSTRUCTION,
          messages: [{ role: 'user', content: 'Detect the language: "Bonjour"' }],
          inference: DETECTION_INFERENCE,
        },
      ]);
      expect(conversations.getHistory('detection')).toHaveLength(0);
      expect(conversations.getHistory('translation')).toHaveLength(0);
    });

    it('should not carry earlier detections into later requests', async () => {
      const client = new FakeModelClient().replyWith('fr', 'de');
      const { service } = createSession(client);

      await service.detectLanguage('Bonjour');
      await service.detectLanguage('Hallo');

      expect(client.requests[1].messages).toEqual([{ role: 'user', content: 'Detect the language: "Hallo"' }]);
    });

    it('should fall back to the default for replies that are not a two-letter code', async () => {
      const client = new FakeModelClient().replyWith('French', undefined);
      const { service } = createSession(client);

      expect(await service.detectLanguage('Bonjour')).toBe('en');
      expect(await service.detectLanguage('Bonjour')).toBe('en');
    });

    it('should never throw, whatever the fault', async () => {
      const faults: unknown[] = [
        new ValidationException({ message: 'bad model', $metadata: {} }),
        new AccessDeniedException({ message: 'denied', $metadata: {} }),
        throttled(),
        new ServiceUnavailableException({ message: 'down', $metadata: {} }),
        new InternalServerException({ message: 'oops', $metadata: {} }),
        Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
        new Error('boom'),
        'not even an error',
      ];
      const client = new FakeModelClient();
      faults.forEach((fault) => client.failWith(fault));
      const { service } = createSession(client);

      for (let i = 0; i < faults.length; i++) {
        expect(await service.detectLanguage('Bonjour')).toBe('en');
      }
      expect(client.requests).toHaveLength(faults.length);
    });
  });

  describe('dispose', () => {
    it('should release the connection exactly once', () => {
      const client = new FakeModelClient();
      const { service } = createSession(client);

      service.dispose();
      service.dispose();

      expect(client.disposeCount).toBe(1);
      expect(service.getStatus().disposed).toBe(true);
    });

    it('should reject translations and default detections after dispose', async () => {
      const client = new FakeModelClient();
      const { service } = createSession(client);
      service.dispose();

      await expect(service.translate('Save', 'fr')).rejects.toBeInstanceOf(ConfigurationError);
      expect(await service.detectLanguage('Bonjour')).toBe('en');
      expect(client.requests).toHaveLength(0);
    });
  });
});
