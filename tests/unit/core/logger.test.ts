import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { cleanupOldLogs, generateLogFilename } from '../../../src/core/logger.js';

describe('generateLogFilename', () => {
  it('stamps the file name with a filesystem-safe ISO time', () => {
    expect(generateLogFilename(new Date('2024-03-05T10:20:30.456Z'))).toBe(
      'regulator-2024-03-05T10-20-30-456Z.log'
    );
  });
});

describe('cleanupOldLogs', () => {
  const logDir = path.join(tmpdir(), `logger-test-${String(Date.now())}`);

  function writeLog(name: string, content: string, mtimeSec: number): void {
    const file = path.join(logDir, name);
    fs.writeFileSync(file, content);
    fs.utimesSync(file, mtimeSec, mtimeSec);
  }

  beforeEach(() => {
    fs.mkdirSync(logDir, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('keeps the newest files and drops empty ones', () => {
    writeLog('regulator-a.log', 'old', 1000);
    writeLog('regulator-b.log', 'newer', 2000);
    writeLog('regulator-c.log', 'newest', 3000);
    writeLog('regulator-empty.log', '', 4000);
    writeLog('notes.txt', '', 500);

    const failed = cleanupOldLogs(logDir, 2);

    expect(failed).toEqual([]);
    expect(fs.readdirSync(logDir).sort()).toEqual(['notes.txt', 'regulator-b.log', 'regulator-c.log']);
  });

  it('ignores a missing directory', () => {
    expect(cleanupOldLogs(path.join(logDir, 'missing'), 1)).toEqual([]);
  });
});
