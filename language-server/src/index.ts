#!/usr/bin/env node
/**
 * DTCG design token language server (stdio / IPC, via vscode-languageserver).
 */

import {
  createConnection,
  DidChangeConfigurationNotification,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  type InitializeParams,
  type InitializeResult,
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { createModuleLogger } from '../../lib/observability/logger';
import { parseSettings, SETTINGS_SECTION } from './config';
import { TokenWorkspace, uriToPath } from './workspace';
import { hover } from './methods/hover';
import { completion } from './methods/completion';
import { definition } from './methods/definition';
import { references } from './methods/references';
import { colorPresentation, documentColors } from './methods/document-color';
import { computeDiagnostics } from './methods/diagnostics';

const log = createModuleLogger('language-server');

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);
const workspace = new TokenWorkspace();

let hasConfigurationCapability = false;
let hasRelatedInformationCapability = false;

function publishDiagnostics(document: TextDocument): void {
  const diagnostics = computeDiagnostics(workspace, document, { relatedInformation: hasRelatedInformationCapability });
  void connection.sendDiagnostics({ uri: document.uri, diagnostics });
}

/** Reload every token file, then refresh diagnostics on every open document. */
async function reloadTokens(): Promise<void> {
  await workspace.reload();
  documents.all().forEach(publishDiagnostics);
}

function scheduleReload(reason: string): void {
  reloadTokens().catch((error: unknown) => {
    log.error({ err: error, reason }, 'Token reload failed');
  });
}

/** Nothing sent keeps the current settings. */
function applySettings(raw: unknown, rootPath?: string): void {
  if (raw === null || raw === undefined) {
    workspace.configure(workspace.getSettings(), rootPath);
    return;
  }
  const { settings, error } = parseSettings(raw);
  if (error) {
    log.warn({ issues: error.issues }, 'Invalid settings, using defaults');
  }
  workspace.configure(settings, rootPath);
}

function rootPathOf(params: InitializeParams): string | undefined {
  const uri = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
  return uri ? uriToPath(uri) : undefined;
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

connection.onInitialize((params: InitializeParams): InitializeResult => {
  const { capabilities } = params;
  hasConfigurationCapability = Boolean(capabilities.workspace?.configuration);
  hasRelatedInformationCapability = Boolean(capabilities.textDocument?.publishDiagnostics?.relatedInformation);

  applySettings(params.initializationOptions, rootPathOf(params));
  log.info({ tokenFiles: workspace.getTokenFiles().length }, 'Initializing');

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: true,
      completionProvider: { triggerCharacters: ['-', '('] },
      definitionProvider: true,
      referencesProvider: true,
      colorProvider: true,
    },
    serverInfo: { name: 'dtcg-language-server' },
  };
});

connection.onInitialized(() => {
  if (hasConfigurationCapability) {
    void connection.client.register(DidChangeConfigurationNotification.type, { section: SETTINGS_SECTION });
  }
  scheduleReload('initialized');
});

connection.onDidChangeConfiguration((change) => {
  const pending: Promise<unknown> = hasConfigurationCapability
    ? connection.workspace.getConfiguration(SETTINGS_SECTION)
    : Promise.resolve(change.settings);

  pending
    .then((raw) => {
      applySettings(raw);
      return reloadTokens();
    })
    .catch((error: unknown) => {
      log.error({ err: error }, 'Failed to apply configuration');
    });
});

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

function onTokenFileEdited(document: TextDocument, content: string | undefined): boolean {
  const filePath = uriToPath(document.uri);
  if (!workspace.isTokenFile(filePath)) return false;
  workspace.setOverlay(filePath, content);
  scheduleReload(`edited ${filePath}`);
  return true;
}

documents.onDidChangeContent(({ document }) => {
  if (!onTokenFileEdited(document, document.getText())) publishDiagnostics(document);
});

documents.onDidClose(({ document }) => {
  if (!onTokenFileEdited(document, undefined)) {
    void connection.sendDiagnostics({ uri: document.uri, diagnostics: [] });
  }
});

connection.onDidChangeWatchedFiles(({ changes }) => {
  if (changes.some((change) => workspace.isTokenFile(uriToPath(change.uri)))) {
    scheduleReload('watched file changed');
  }
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

connection.onHover(({ textDocument, position }) => {
  const document = documents.get(textDocument.uri);
  return document ? hover(workspace, document, position) : null;
});

connection.onCompletion(({ textDocument, position }) => {
  const document = documents.get(textDocument.uri);
  return document ? completion(workspace, document, position) : [];
});

connection.onDefinition(({ textDocument, position }) => {
  const document = documents.get(textDocument.uri);
  return document ? definition(workspace, document, position) : null;
});

connection.onReferences(({ textDocument, position, context }) => {
  const document = documents.get(textDocument.uri);
  if (!document) return [];
  return references(workspace, document, position, {
    includeDeclaration: context.includeDeclaration,
    documents: documents.all(),
  });
});

connection.onDocumentColor(({ textDocument }) => {
  const document = documents.get(textDocument.uri);
  return document ? documentColors(workspace, document) : [];
});

connection.onColorPresentation(({ textDocument, color, range }) => {
  const document = documents.get(textDocument.uri);
  return document ? colorPresentation(workspace, document, color, range) : [];
});

documents.listen(connection);
connection.listen();
