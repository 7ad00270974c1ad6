import { ModelReply, ModelRequest } from '../entities/Model.js';
import { TranslatorError } from '../errors/TranslatorErrors.js';

/**
 * Interface for the remote model-invocation transport
 */
export interface IModelClient {
  /**
   * Send an ordered list of role-tagged turns and return the single reply turn.
   * Transport and service faults are thrown as the provider raised them.
   */
  converse(request: ModelRequest): Promise<ModelReply>;

  /**
   * Release the underlying connection
   */
  dispose(): void;
}

/**
 * Turns a fault raised by a model client into a typed translator error
 */
export type ProviderErrorMapper = (error: unknown, modelId: string) => TranslatorError;
