import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TranslationService } from '../../application/services/TranslationService.js';
import { Config } from '../../config.js';
import { errorResult, textResult } from './toolResults.js';

/**
 * Register the session-status tool
 */
export function registerSessionStatusTool(
  server: McpServer,
  getTranslationService: () => TranslationService,
  config: Config
) {
  server.tool(
    'session-status',
    'Show the AWS profile, region and model in use and the size of the current transcripts',
    {},
    async () => {
      try {
        const status = {
          timestamp: new Date().toISOString(),
          profile: config.aws.profileName,
          region: config.aws.region,
          ...getTranslationService().getStatus(),
        };

        return textResult(`# Session Status\n\n\`\`\`json\n${JSON.stringify(status, null, 2)}\n\`\`\``);
      } catch (error) {
        return errorResult('Session status error', error);
      }
    }
  );
}
