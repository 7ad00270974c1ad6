import languageNames from './languages.json';

/**
 * Read-only lookup from language code to display name, used to render
 * human-readable names into prompts.
 */
export class LanguageTable {
  private readonly names: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string>) {
    this.names = new Map(Object.entries(entries));
  }

  /**
   * Display name for a code, or the code itself when it is not in the table.
   * Lookup is case-sensitive ("zh-CN", "fr-ca").
   */
  getName(code: string): string {
    return this.names.get(code) ?? code;
  }

  has(code: string): boolean {
    return this.names.has(code);
  }

  get size(): number {
    return this.names.size;
  }
}

export const DEFAULT_LANGUAGE_TABLE = new LanguageTable(languageNames);
