import {
  BedrockRuntimeClient,
  ConverseCommand,
  ConverseCommandInput,
  ConverseCommandOutput,
  Message,
} from '@aws-sdk/client-bedrock-runtime';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import { IModelClient } from '../../core/interfaces/IModelClient.js';
import { ICredentialResolver } from '../../core/interfaces/ICredentialResolver.js';
import { ModelReply, ModelRequest } from '../../core/entities/Model.js';
import { ConfigurationError } from '../../core/errors/TranslatorErrors.js';
import { ProfileCredentialResolver } from '../aws/ProfileCredentialResolver.js';

/**
 * The slice of BedrockRuntimeClient this client needs
 */
export interface ConverseSender {
  send(command: ConverseCommand): Promise<ConverseCommandOutput>;
  destroy(): void;
}

export interface BedrockClientOptions {
  profileName: string;
  region: string;
  credentialResolver?: ICredentialResolver;
}

/**
 * AWS Bedrock Converse API client implementation
 */
export class BedrockConverseClient implements IModelClient {
  private destroyed = false;

  constructor(private sender: ConverseSender) {}

  /**
   * Resolve credentials for the profile and open a runtime client.
   * Credentials are resolved up front so a bad profile fails here, not on
   * the first translate call.
   */
  static async create(options: BedrockClientOptions): Promise<BedrockConverseClient> {
    const resolver = options.credentialResolver ?? new ProfileCredentialResolver();

    let credentials: AwsCredentialIdentity;
    try {
      credentials = await resolver.resolve(options.profileName);
    } catch (error) {
      throw new ConfigurationError(
        `AWS credentials for profile '${options.profileName}' not found. Please configure your AWS credentials using the AWS CLI or SDK.`,
        error
      );
    }

    try {
      const runtime = new BedrockRuntimeClient({ region: options.region, credentials });
      return new BedrockConverseClient({
        send: (command) => runtime.send(command),
        destroy: () => runtime.destroy(),
      });
    } catch (error) {
      throw new ConfigurationError(
        'Failed to initialize AWS Bedrock client. Please ensure AWS credentials are configured correctly.',
        error
      );
    }
  }

  async converse(request: ModelRequest): Promise<ModelReply> {
    const response = await this.sender.send(new ConverseCommand(toConverseInput(request)));

    return {
      text: response.output?.message?.content?.[0]?.text,
      stopReason: response.stopReason,
    };
  }

  dispose(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.sender.destroy();
  }
}

/**
 * Build the Converse request body from a provider-neutral request
 */
export function toConverseInput(request: ModelRequest): ConverseCommandInput {
  const messages: Message[] = request.messages.map((turn) => ({
    role: turn.role,
    content: [{ text: turn.content }],
  }));

  return {
    modelId: request.modelId,
    messages,
    system: request.system ? [{ text: request.system }] : undefined,
    inferenceConfig: {
      maxTokens: request.inference.maxTokens,
      temperature: request.inference.temperature,
      topP: request.inference.topP,
    },
  };
}
