import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Logger, errorFields, silentLogger } from '../../utils/logger.js';

export const SETTINGS_FILE_NAME = 'aws-config.json';

export interface AwsSettings {
  profileName: string;
  region: string;
}

export const DEFAULT_SETTINGS: AwsSettings = {
  profileName: 'default',
  region: 'us-east-1',
};

const SettingsSchema = z.object({
  profileName: z.string().min(1).default(DEFAULT_SETTINGS.profileName),
  region: z.string().min(1).default(DEFAULT_SETTINGS.region),
});

export function defaultSettingsPath(): string {
  return path.join(process.cwd(), SETTINGS_FILE_NAME);
}

/**
 * Persisted AWS profile and region, kept in a small JSON file
 */
export class SettingsStore {
  constructor(
    private filePath: string = defaultSettingsPath(),
    private logger: Logger = silentLogger
  ) {}

  getPath(): string {
    return this.filePath;
  }

  /**
   * Load settings. A missing file gives the defaults; an unreadable or
   * malformed one gives the defaults and a warning.
   */
  load(): AwsSettings {
    if (!fs.existsSync(this.filePath)) {
      return { ...DEFAULT_SETTINGS };
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const result = SettingsSchema.safeParse(raw);
      if (!result.success) {
        this.logger.warn('Settings file is invalid, using defaults', {
          file: this.filePath,
          issues: result.error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
        });
        return { ...DEFAULT_SETTINGS };
      }
      return result.data;
    } catch (error) {
      this.logger.warn('Settings file could not be read, using defaults', {
        file: this.filePath,
        ...errorFields(error),
      });
      return { ...DEFAULT_SETTINGS };
    }
  }

  /**
   * Write settings as indented JSON. Returns false when the file could not
   * be written; the running session keeps working either way.
   */
  save(settings: AwsSettings): boolean {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
      return true;
    } catch (error) {
      this.logger.error('Failed to save settings', { file: this.filePath, ...errorFields(error) });
      return false;
    }
  }
}
