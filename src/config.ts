import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MODEL_ID } from './core/entities/Model.js';
import { ConfigurationError } from './core/errors/TranslatorErrors.js';
import { SettingsStore, defaultSettingsPath } from './infrastructure/settings/SettingsStore.js';
import { createLogger } from './utils/logger.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  aws: {
    profileName: string;
    region: string;
    modelId: string;
  };
  settingsFile: string;
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  aws: z.object({
    profileName: z.string().min(1, 'AWS profile name must not be empty'),
    region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'Invalid AWS region (e.g., us-east-1)'),
    modelId: z.string().min(1, 'Model ID must not be empty'),
  }),
  settingsFile: z.string().min(1),
});

/**
 * Parse command line arguments
 * Usage: node dist/index.js --profile translator --region us-west-2 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, environment variables, the saved
 * settings file and defaults, in that order of precedence.
 * Throws ConfigurationError when the result does not validate.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getOptional = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    getOptional(cliKey, envKey) ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const settingsFile = getString('settings-file', 'SETTINGS_FILE', defaultSettingsPath());
  const saved = new SettingsStore(settingsFile, createLogger('settings')).load();

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'ui-string-translator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    aws: {
      profileName: getString('profile', 'AWS_PROFILE', saved.profileName),
      region: getString('region', 'AWS_REGION', saved.region),
      modelId: getString('model-id', 'BEDROCK_MODEL_ID', DEFAULT_MODEL_ID),
    },
    settingsFile,
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    console.error('\nConfiguration Validation Failed!\n');
    console.error('Errors:');
    const issues = result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    issues.forEach((issue) => console.error(`  - ${issue}`));
    console.error('\nTips:');
    console.error('  - Check your .env file');
    console.error('  - Verify CLI arguments');
    console.error(`  - Check the saved settings in ${settingsFile}`);
    console.error();
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, result.error);
  }

  return result.data;
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('='.repeat(68));
  console.error('  UI String Translator MCP Server - Configuration');
  console.error('='.repeat(68));

  console.error(`\nServer:   ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`Profile:  ${config.aws.profileName}`);
  console.error(`Region:   ${config.aws.region}`);
  console.error(`Model:    ${config.aws.modelId}`);
  console.error(`Settings: ${config.settingsFile}`);

  console.error('\n' + '-'.repeat(68));
}
