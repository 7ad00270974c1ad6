import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ConversationService } from '../../application/services/ConversationService.js';
import { TranslationService } from '../../application/services/TranslationService.js';
import { errorResult, textResult } from './toolResults.js';

/**
 * Register the manage-transcript tool
 */
export function registerManageTranscriptTool(
  server: McpServer,
  getTranslationService: () => TranslationService,
  conversationService: ConversationService
) {
  server.tool(
    'manage-transcript',
    'View or reset the translation transcript that is resent to the model with every request',
    {
      action: z
        .enum(['view', 'reset'])
        .describe("Action to perform: 'view' to see the transcript, 'reset' to start a fresh context"),
    },
    async ({ action }) => {
      try {
        if (action === 'reset') {
          const { turns } = conversationService.getStats('translation');
          getTranslationService().resetTranslationContext();
          return textResult(`✓ Translation transcript reset (${turns} turns dropped)`);
        }

        const history = conversationService.getHistory('translation');
        if (history.length === 0) {
          return textResult('The translation transcript is empty.');
        }

        const historyText = history
          .map((turn, idx) => `${idx + 1}. **${turn.role === 'user' ? 'User' : 'Assistant'}**\n${turn.content}\n`)
          .join('\n---\n\n');

        return textResult(`# Translation Transcript (${history.length} turns)\n\n${historyText}`);
      } catch (error) {
        return errorResult('Error managing transcript', error);
      }
    }
  );
}
