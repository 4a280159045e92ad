/**
 * Token workspace: reads the configured token files, runs them through the
 * loading pipeline and keeps the result for the LSP handlers.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { URI } from 'vscode-uri';
import { createModuleLogger } from '../../lib/observability/logger';
import { TokenManager } from '../../lib/design-tokens/token-manager';
import { loadTokenSet, type TokenFileSource, type TokenSet } from '../../lib/design-tokens/loader';
import { defaultRegistry, type SchemaRegistry } from '../../lib/design-tokens/schema/registry';
import type { Token } from '../../lib/design-tokens/types';
import { DEFAULT_SETTINGS, resolveTokenFiles, type ServerSettings, type TokenFileConfig } from './config';

const log = createModuleLogger('workspace');

export type ReadFileFn = (filePath: string) => Promise<string>;

const readUtf8: ReadFileFn = (filePath) => readFile(filePath, 'utf8');

const EMPTY_SET: TokenSet = { files: [], failures: [], tokens: [] };

export function uriToPath(uri: string): string {
  return URI.parse(uri).fsPath;
}

export class TokenWorkspace {
  readonly tokens = new TokenManager();

  private settings: ServerSettings = DEFAULT_SETTINGS;
  private rootPath: string | undefined;
  private files: TokenFileConfig[] = [];
  private current: TokenSet = EMPTY_SET;
  /** Unsaved editor contents, by absolute path. */
  private readonly overlays = new Map<string, string>();
  private generation = 0;

  constructor(
    private readonly readFileFn: ReadFileFn = readUtf8,
    readonly registry: SchemaRegistry = defaultRegistry,
  ) {}

  configure(settings: ServerSettings, rootPath?: string): void {
    this.settings = settings;
    if (rootPath !== undefined) this.rootPath = rootPath;
    this.files = resolveTokenFiles(settings, this.rootPath);
  }

  getSettings(): ServerSettings {
    return this.settings;
  }

  getTokenFiles(): readonly TokenFileConfig[] {
    return this.files;
  }

  isTokenFile(filePath: string): boolean {
    const resolved = path.resolve(filePath);
    return this.files.some((file) => file.path === resolved);
  }

  /** Use editor contents for a token file instead of what is on disk. */
  setOverlay(filePath: string, content: string | undefined): void {
    const resolved = path.resolve(filePath);
    if (content === undefined) this.overlays.delete(resolved);
    else this.overlays.set(resolved, content);
  }

  /**
   * Re-read and re-resolve every configured token file. When reloads
   * overlap, only the last one started is applied.
   */
  async reload(): Promise<TokenSet> {
    const generation = ++this.generation;
    const sources: TokenFileSource[] = [];
    const readFailures: TokenSet['failures'] = [];

    await Promise.all(
      this.files.map(async (file) => {
        try {
          const content = this.overlays.get(file.path) ?? (await this.readFileFn(file.path));
          sources.push({
            filePath: file.path,
            content,
            prefix: file.prefix,
            groupMarkers: file.groupMarkers,
            schemaVersion: file.schemaVersion,
            strict: this.settings.strict,
          });
        } catch (error) {
          log.error({ filePath: file.path, err: error }, 'Failed to read token file');
          readFailures.push({ filePath: file.path, error: error instanceof Error ? error : new Error(String(error)) });
        }
      }),
    );

    if (generation !== this.generation) {
      log.debug({ generation }, 'Discarding superseded token reload');
      return this.current;
    }

    // Keep configuration order so later files win name clashes.
    const order = new Map(this.files.map((file, index) => [file.path, index]));
    sources.sort((a, b) => (order.get(a.filePath) ?? 0) - (order.get(b.filePath) ?? 0));

    const set = loadTokenSet(sources, this.registry);
    this.current = { ...set, failures: [...readFailures, ...set.failures] };

    this.tokens.clear();
    this.tokens.addAll(set.tokens);

    log.info(
      { files: set.files.length, failed: this.current.failures.length, tokens: this.tokens.count() },
      'Loaded design tokens',
    );
    return this.current;
  }

  getTokenSet(): TokenSet {
    return this.current;
  }

  getToken(nameOrVariable: string): Token | undefined {
    return this.tokens.get(nameOrVariable);
  }
}
