import { TextDocument } from 'vscode-languageserver-textdocument';
import { TokenWorkspace } from '../../workspace';
import { parseSettings } from '../../config';

export const TOKENS_PATH = '/work/tokens.json';
export const TOKENS_URI = 'file:///work/tokens.json';
export const STYLES_URI = 'file:///work/styles.css';

export const TOKENS_JSON = [
  '{',
  '  "color": {',
  '    "$type": "color",',
  '    "primary": { "$value": "#ff0000", "$description": "Brand red" },',
  '    "accent": { "$value": "{color.primary}" },',
  '    "old": { "$value": "#00ff00", "$deprecated": "Use color.accent" }',
  '  },',
  '  "space": {',
  '    "sm": { "$value": "4px", "$type": "dimension" }',
  '  }',
  '}',
].join('\n');

/** Workspace with one token file (prefix `ds`) read from memory. */
export async function loadWorkspace(content: string = TOKENS_JSON): Promise<TokenWorkspace> {
  const workspace = new TokenWorkspace(async () => content);
  workspace.configure(parseSettings({ tokensFiles: ['tokens.json'], prefix: 'ds' }).settings, '/work');
  await workspace.reload();
  return workspace;
}

export function tokenDocument(content: string = TOKENS_JSON): TextDocument {
  return TextDocument.create(TOKENS_URI, 'json', 1, content);
}

export function stylesheet(text: string, uri: string = STYLES_URI): TextDocument {
  return TextDocument.create(uri, 'css', 1, text);
}
