import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_UTTERANCE,
  loadDialog,
  parseDialogLine,
  parseInputs,
  parseScript,
} from '../../../src/simulation/dialog.js';
import { createMockLogger } from '../../helpers/factories.js';

describe('parseDialogLine', () => {
  it('reads a plain utterance', () => {
    expect(parseDialogLine('  how are you  ')).toEqual({ text: 'how are you', newUserInput: true });
  });

  it('reads the pause prefix', () => {
    expect(parseDialogLine('[pause=2500] still there?')).toEqual({
      text: 'still there?',
      pauseMs: 2500,
      newUserInput: true,
    });
  });

  it('treats the silent marker as no new input', () => {
    expect(parseDialogLine('...')).toEqual({ text: '', newUserInput: false });
    expect(parseDialogLine('[pause=7000] ...')).toEqual({
      text: '',
      pauseMs: 7000,
      newUserInput: false,
    });
    expect(parseDialogLine('[pause=3000]')).toEqual({
      text: '',
      pauseMs: 3000,
      newUserInput: false,
    });
  });

  it('keeps a malformed prefix as text', () => {
    expect(parseDialogLine('[pause=soon] hi')).toEqual({ text: '[pause=soon] hi', newUserInput: true });
  });
});

describe('parseScript', () => {
  it('splits on semicolons and drops empty parts', () => {
    expect(parseScript('hi; ;[pause=2000] anyone?;...').map((t) => t.text)).toEqual([
      'hi',
      'anyone?',
      '',
    ]);
  });
});

describe('parseInputs', () => {
  it('reads one turn per non-empty line', () => {
    const turns = parseInputs('first\r\n\r\n  second  \n');
    expect(turns.map((t) => t.text)).toEqual(['first', 'second']);
  });
});

describe('loadDialog', () => {
  const testDir = join(tmpdir(), `dialog-test-${String(Date.now())}`);

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('prefers the inputs file over the script', async () => {
    const inputsFile = join(testDir, 'inputs.txt');
    await writeFile(inputsFile, 'one\ntwo\n');

    const turns = await loadDialog({ inputsFile, script: 'three', cycles: 1 }, createMockLogger());

    expect(turns.map((t) => t.text)).toEqual(['one', 'two']);
  });

  it('falls back to the script when the file cannot be read', async () => {
    const logger = createMockLogger();

    const turns = await loadDialog(
      { inputsFile: join(testDir, 'missing.txt'), script: 'a;b', cycles: 2 },
      logger
    );

    expect(turns.map((t) => t.text)).toEqual(['a', 'b']);
    expect(logger.messages('warn')).toEqual(['Failed to read inputs file, falling back']);
  });

  it('pads a short dialog with the default utterance', async () => {
    const turns = await loadDialog({ inputsFile: null, script: 'only one', cycles: 3 }, createMockLogger());

    expect(turns).toEqual([
      { text: 'only one', newUserInput: true },
      { text: DEFAULT_UTTERANCE, newUserInput: true },
      { text: DEFAULT_UTTERANCE, newUserInput: true },
    ]);
  });

  it('runs at least one turn', async () => {
    const turns = await loadDialog({ inputsFile: null, script: null, cycles: 0 }, createMockLogger());
    expect(turns).toHaveLength(1);
  });

  it('loads the bundled sample dialog', async () => {
    const inputsFile = fileURLToPath(
      new URL('../../../data/scripts/sample-dialog.txt', import.meta.url)
    );

    const turns = await loadDialog({ inputsFile, script: null, cycles: 1 }, createMockLogger());

    expect(turns).toHaveLength(8);
    expect(turns[2]).toEqual({
      text: 'I keep getting the same error on the same step',
      pauseMs: 2500,
      newUserInput: true,
    });
    expect(turns[4]).toEqual({ text: '', newUserInput: false });
    expect(turns[5]).toEqual({ text: '', pauseMs: 7000, newUserInput: false });
  });
});
