import { describe, it, expect } from 'vitest';
import { definition } from '../definition';
import { TOKENS_URI, loadWorkspace, stylesheet, tokenDocument } from './fixture';

describe('definition', () => {
  it('jumps from a var() call to the token key', async () => {
    const workspace = await loadWorkspace();
    const result = definition(workspace, stylesheet('a { margin: var(--ds-space-sm); }'), { line: 0, character: 20 });

    expect(result).toEqual({
      uri: TOKENS_URI,
      range: { start: { line: 8, character: 5 }, end: { line: 8, character: 5 } },
    });
  });

  it('jumps from a reference to the token it names', async () => {
    const workspace = await loadWorkspace();
    const result = definition(workspace, tokenDocument(), { line: 4, character: 35 });
    expect(result?.range.start).toEqual({ line: 3, character: 5 });
  });

  it('returns null for unknown properties', async () => {
    const workspace = await loadWorkspace();
    expect(definition(workspace, stylesheet('var(--ds-nope)'), { line: 0, character: 6 })).toBeNull();
  });
});
