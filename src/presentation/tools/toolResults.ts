import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { TranslatorError, describeRemediation } from '../../core/errors/TranslatorErrors.js';

/**
 * Plain text tool result
 */
export function textResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * Error tool result. Translator errors carry their kind and a remediation
 * hint so the calling agent can tell a bad profile from a throttled request.
 */
export function errorResult(context: string, error: unknown): CallToolResult {
  if (error instanceof TranslatorError) {
    const payload = error.toPayload();
    const details = [
      `**Kind**: ${payload.kind}`,
      payload.errorCode ? `**Code**: ${payload.errorCode}` : undefined,
      payload.modelId ? `**Model**: ${payload.modelId}` : undefined,
      `**Retryable**: ${payload.retryable ? 'yes' : 'no'}`,
    ].filter((line): line is string => line !== undefined);

    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `${context}: ${payload.message}\n\n${details.join('\n')}\n\n${describeRemediation(payload.kind)}`,
        },
      ],
    };
  }

  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: `${context}: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
  };
}
