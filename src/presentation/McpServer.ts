import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { ConversationService } from '../application/services/ConversationService.js';
import { TranslationService } from '../application/services/TranslationService.js';
import { ICredentialResolver } from '../core/interfaces/ICredentialResolver.js';
import { ConfigurationError } from '../core/errors/TranslatorErrors.js';
import { BedrockConverseClient } from '../infrastructure/bedrock/BedrockConverseClient.js';
import { mapBedrockError } from '../infrastructure/bedrock/BedrockErrorMapper.js';
import { SettingsStore } from '../infrastructure/settings/SettingsStore.js';
import { Logger, createLogger } from '../utils/logger.js';
import { registerTranslateTextTool } from './tools/TranslateTextTool.js';
import { registerDetectLanguageTool } from './tools/DetectLanguageTool.js';
import { registerManageTranscriptTool } from './tools/ManageTranscriptTool.js';
import { registerSessionStatusTool } from './tools/SessionStatusTool.js';
import { registerConfigureProfileTool } from './tools/ConfigureProfileTool.js';

/**
 * Main MCP Server class that wires the translation session to its tools
 */
export class McpServer {
  private server: BaseMcpServer;
  private conversationService: ConversationService;
  private translationService: TranslationService | null = null;
  private settingsStore: SettingsStore;
  private logger: Logger;
  private closed = false;

  constructor(
    private config: Config,
    private credentialResolver?: ICredentialResolver
  ) {
    this.logger = createLogger('mcp-server', config.server.debug);
    this.conversationService = new ConversationService();
    this.settingsStore = new SettingsStore(config.settingsFile, createLogger('settings', config.server.debug));

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });

    this.registerTools();
  }

  /**
   * Open the translation session. Credentials are resolved here, so a
   * misconfigured profile stops startup with a ConfigurationError.
   */
  async openSession(): Promise<TranslationService> {
    if (this.translationService) {
      return this.translationService;
    }

    const modelClient = await BedrockConverseClient.create({
      profileName: this.config.aws.profileName,
      region: this.config.aws.region,
      credentialResolver: this.credentialResolver,
    });

    this.translationService = new TranslationService(modelClient, this.conversationService, {
      modelId: this.config.aws.modelId,
      mapError: mapBedrockError,
      logger: createLogger('translation', this.config.server.debug),
    });

    this.logger.debug('Translation session opened', {
      profile: this.config.aws.profileName,
      region: this.config.aws.region,
      model: this.config.aws.modelId,
    });

    return this.translationService;
  }

  /**
   * Register all tools
   */
  private registerTools() {
    const getTranslationService = () => {
      if (!this.translationService) {
        throw new ConfigurationError('Translation session is not open');
      }
      return this.translationService;
    };

    registerTranslateTextTool(this.server, getTranslationService, this.logger);
    registerDetectLanguageTool(this.server, getTranslationService);
    registerManageTranscriptTool(this.server, getTranslationService, this.conversationService);
    registerSessionStatusTool(this.server, getTranslationService, this.config);
    registerConfigureProfileTool(this.server, this.settingsStore);
  }

  /**
   * Start the MCP server on stdio
   */
  async start() {
    await this.openSession();

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      this.logger.warn('stdin error (non-fatal)', { error: error.message });
    });

    process.stdin.on('end', () => {
      this.logger.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error(`\nUI String Translator MCP Server running on stdio`);
  }

  /**
   * Graceful shutdown. Releases the Bedrock connection exactly once.
   */
  async shutdown() {
    if (this.closed) {
      return;
    }
    this.closed = true;

    console.error('\nShutting down gracefully...');

    try {
      this.translationService?.dispose();
    } finally {
      await this.server.close();
    }
  }
}
