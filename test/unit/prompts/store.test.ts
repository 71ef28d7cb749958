import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_PROMPTS, PromptStore } from '../../../src/prompts/store.js';
import { createTestLogger } from '../../helpers/index.js';

describe('PromptStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read the prompt file, trimmed', async () => {
    await writeFile(join(dir, 'explainer.txt'), '  Explain simply.\n\n');
    const store = new PromptStore({ dir });

    expect(await store.get('explainer')).toBe('Explain simply.');
  });

  it('should fall back to the default and warn when the file is missing', async () => {
    const { logger, sink } = createTestLogger('prompts');
    const store = new PromptStore({ dir, logger });

    expect(await store.get('social_post')).toBe(DEFAULT_PROMPTS.social_post);
    const records = [...sink.query('warning')];
    expect(records).toHaveLength(1);
    expect(records[0]?.message).toContain('social_post.txt unavailable');
  });

  it('should fall back to the default for an empty file', async () => {
    await writeFile(join(dir, 'infographic.txt'), '   \n');
    const store = new PromptStore({ dir });

    expect(await store.get('infographic')).toBe(DEFAULT_PROMPTS.infographic);
  });

  it('should see edits immediately with refresh always', async () => {
    const path = join(dir, 'explainer.txt');
    await writeFile(path, 'First version');
    const store = new PromptStore({ dir, refresh: 'always' });
    expect(await store.get('explainer')).toBe('First version');

    await writeFile(path, 'Second version');

    expect(await store.get('explainer')).toBe('Second version');
  });

  it('should keep the first read with refresh cached until reload', async () => {
    const path = join(dir, 'explainer.txt');
    await writeFile(path, 'First version');
    const store = new PromptStore({ dir, refresh: 'cached' });
    expect(await store.get('explainer')).toBe('First version');

    await writeFile(path, 'Second version');
    expect(await store.get('explainer')).toBe('First version');

    store.reload();
    expect(await store.get('explainer')).toBe('Second version');
  });
});
