import { readFile } from 'node:fs/promises';
import type { Logger } from '../types/index.js';

export const DEFAULT_UTTERANCE = 'hello there';

/** Marker text for a turn where the user says nothing */
export const SILENT_MARKER = '...';

const PAUSE_PREFIX = /^\[pause=(\d+)\]\s*/;

/**
 * One scripted user turn.
 */
export interface DialogTurn {
  text: string;
  /** User silence before this turn, in ms (device pause when absent) */
  pauseMs?: number;
  /** False when the turn carries no new user input and the silence continues */
  newUserInput: boolean;
}

export interface DialogSource {
  inputsFile: string | null;
  script: string | null;
  cycles: number;
}

/**
 * Parse one line: optional `[pause=<ms>]` prefix, then the utterance.
 * A bare `...` is a silent turn.
 */
export function parseDialogLine(line: string): DialogTurn {
  let text = line.trim();
  let pauseMs: number | undefined;

  const match = PAUSE_PREFIX.exec(text);
  if (match?.[1] !== undefined) {
    pauseMs = Number(match[1]);
    text = text.slice(match[0].length).trim();
  }

  const silent = text === '' || text === SILENT_MARKER;
  const turn: DialogTurn = { text: silent ? '' : text, newUserInput: !silent };
  if (pauseMs !== undefined) turn.pauseMs = pauseMs;
  return turn;
}

/**
 * Split a `;`-separated script into turns.
 */
export function parseScript(script: string): DialogTurn[] {
  return script
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseDialogLine);
}

/**
 * Parse file contents: one turn per non-empty line.
 */
export function parseInputs(contents: string): DialogTurn[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(parseDialogLine);
}

/**
 * Load the session's turns.
 *
 * Priority: inputs file, then script, then `cycles` default utterances.
 * A shorter dialog is padded with the default utterance up to `cycles`.
 */
export async function loadDialog(source: DialogSource, logger: Logger): Promise<DialogTurn[]> {
  const log = logger.child({ component: 'dialog' });
  let turns: DialogTurn[] = [];

  if (source.inputsFile) {
    try {
      turns = parseInputs(await readFile(source.inputsFile, 'utf-8'));
    } catch (error) {
      log.warn(
        {
          path: source.inputsFile,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to read inputs file, falling back'
      );
    }
  }

  if (turns.length === 0 && source.script) {
    turns = parseScript(source.script);
  }

  const cycles = Math.max(1, source.cycles);
  while (turns.length < cycles) {
    turns.push({ text: DEFAULT_UTTERANCE, newUserInput: true });
  }

  log.debug({ turns: turns.length }, 'Dialog loaded');
  return turns;
}
