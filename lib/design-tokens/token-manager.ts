import { cssVariableName, type Token } from './types';
import { SchemaVersion } from './schema/version';

/**
 * In-memory store of loaded tokens.
 *
 * Tokens are keyed by `filePath:name`, so files that define the same name
 * coexist. Unqualified lookups return the most recently added match.
 */
export class TokenManager {
  private tokens = new Map<string, Token>();
  private latestByName = new Map<string, Token>();
  private latestByVariable = new Map<string, Token>();

  private static key(filePath: string, name: string): string {
    return filePath ? `${filePath}:${name}` : name;
  }

  add(token: Token): void {
    const key = TokenManager.key(token.filePath, token.name);
    // Re-adding moves the token to the end so it wins unqualified lookups.
    this.tokens.delete(key);
    this.tokens.set(key, token);
    this.latestByName.set(token.name, token);
    this.latestByVariable.set(cssVariableName(token), token);
  }

  addAll(tokens: readonly Token[]): void {
    tokens.forEach((token) => this.add(token));
  }

  /**
   * Look up by token name (`color-primary`), dotted path (`color.primary`)
   * or CSS variable (`--color-primary`, `--ds-color-primary`).
   */
  get(nameOrVariable: string): Token | undefined {
    const byVariable = this.latestByVariable.get(nameOrVariable);
    if (byVariable) return byVariable;

    let name = nameOrVariable.replace(/\./g, '-');
    if (name.startsWith('--')) name = name.slice(2);
    return this.latestByName.get(name);
  }

  getQualified(name: string, filePath: string): Token | undefined {
    return this.tokens.get(TokenManager.key(filePath, name));
  }

  getAll(): Token[] {
    return [...this.tokens.values()];
  }

  count(): number {
    return this.tokens.size;
  }

  findByPrefix(prefix: string): Token[] {
    return this.getAll().filter((token) => token.name.startsWith(prefix));
  }

  getBySchemaVersion(version: SchemaVersion): Token[] {
    return this.getAll().filter((token) => token.schemaVersion === version);
  }

  getBySourceFile(filePath: string): Token[] {
    return this.getAll().filter((token) => token.filePath === filePath);
  }

  getSourceFiles(): string[] {
    return [...new Set(this.getAll().map((token) => token.filePath).filter(Boolean))];
  }

  /** Version the file was parsed under, or `unknown` when it has no tokens. */
  getSchemaVersionForFile(filePath: string): SchemaVersion {
    return this.getAll().find((token) => token.filePath === filePath)?.schemaVersion ?? SchemaVersion.Unknown;
  }

  /** Removes an unqualified or `filePath:name` key. Returns whether anything was removed. */
  remove(key: string): boolean {
    const removed = this.tokens.delete(key);
    if (removed) this.reindex();
    return removed;
  }

  removeBySourceFile(filePath: string): number {
    let removed = 0;
    for (const [key, token] of this.tokens) {
      if (token.filePath === filePath) {
        this.tokens.delete(key);
        removed++;
      }
    }
    if (removed > 0) this.reindex();
    return removed;
  }

  clear(): void {
    this.tokens.clear();
    this.latestByName.clear();
    this.latestByVariable.clear();
  }

  private reindex(): void {
    this.latestByName.clear();
    this.latestByVariable.clear();
    for (const token of this.tokens.values()) {
      this.latestByName.set(token.name, token);
      this.latestByVariable.set(cssVariableName(token), token);
    }
  }
}
