import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TranslationService } from '../../application/services/TranslationService.js';
import { Logger, errorFields } from '../../utils/logger.js';
import { errorResult, textResult } from './toolResults.js';

/**
 * Register the translate-text tool
 */
export function registerTranslateTextTool(
  server: McpServer,
  getTranslationService: () => TranslationService,
  logger: Logger
) {
  server.tool(
    'translate-text',
    'Translate a single user interface string with AWS Bedrock. Earlier strings in this session are sent as context.',
    {
      text: z.string().describe('The UI string to translate'),
      target_language: z
        .string()
        .min(1)
        .describe("Target language code, e.g. 'fr', 'es', 'zh-CN'"),
      source_language: z
        .string()
        .optional()
        .describe("Source language code; omit or pass 'auto' to let the model infer it"),
    },
    async ({ text, target_language, source_language }) => {
      try {
        const translated = await getTranslationService().translate(text, target_language, source_language);
        return textResult(translated);
      } catch (error) {
        logger.error('translate-text failed', { target_language, ...errorFields(error) });
        return errorResult('Translation failed', error);
      }
    }
  );
}
