import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TranslationService } from '../../application/services/TranslationService.js';
import { textResult } from './toolResults.js';

/**
 * Register the detect-language tool. Detection is a best-effort hint and
 * always answers with a code, falling back to 'en'.
 */
export function registerDetectLanguageTool(
  server: McpServer,
  getTranslationService: () => TranslationService
) {
  server.tool(
    'detect-language',
    "Detect the language of a string and return its ISO 639-1 code ('en' when unsure)",
    {
      text: z.string().describe('The text whose language should be detected'),
    },
    async ({ text }) => textResult(await getTranslationService().detectLanguage(text))
  );
}
