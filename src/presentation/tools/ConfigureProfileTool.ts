import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SettingsStore } from '../../infrastructure/settings/SettingsStore.js';
import { errorResult, textResult } from './toolResults.js';

/**
 * Register the configure-aws-profile tool
 */
export function registerConfigureProfileTool(server: McpServer, settingsStore: SettingsStore) {
  server.tool(
    'configure-aws-profile',
    'Save the AWS profile and region to use. Takes effect the next time the server starts.',
    {
      profile_name: z.string().min(1).describe('Name of the AWS credentials profile'),
      region: z
        .string()
        .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/)
        .default('us-east-1')
        .describe('AWS region hosting the Bedrock model, e.g. us-east-1'),
    },
    async ({ profile_name, region }) => {
      const saved = settingsStore.save({ profileName: profile_name, region });
      if (!saved) {
        return errorResult('Configuration not saved', new Error(`Could not write ${settingsStore.getPath()}`));
      }
      return textResult(
        `✓ Saved profile '${profile_name}' in ${region} to ${settingsStore.getPath()}. Restart the server to apply.`
      );
    }
  );
}
