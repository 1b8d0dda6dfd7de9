import { afterEach, describe, expect, it, vi } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logSystemCommand: vi.fn(async () => undefined),
}));

import { queryInterpreterMajorVersion, stripTrailingNewlines } from '../../src/services/interpreter-version.js';

describe('stripTrailingNewlines', () => {
  it('drops trailing newlines only', () => {
    expect(stripTrailingNewlines('2\n')).toBe('2');
    expect(stripTrailingNewlines('2\n\n')).toBe('2');
    expect(stripTrailingNewlines('2\r\n')).toBe('2\r');
    expect(stripTrailingNewlines(' 2 \n')).toBe(' 2 ');
    expect(stripTrailingNewlines('2\n3\n')).toBe('2\n3');
  });
});

describe('queryInterpreterMajorVersion', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  async function fakeInterpreter(body: string): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'report-gate-interpreter-'));
    dirs.push(dir);
    const scriptPath = path.join(dir, 'fake-python');
    await writeFile(scriptPath, `#!/bin/sh\n${body}\n`, 'utf8');
    await chmod(scriptPath, 0o755);
    return scriptPath;
  }

  it('returns the printed major version', async () => {
    const interpreter = await fakeInterpreter("printf '2\\n'");

    const result = await queryInterpreterMajorVersion(interpreter, 5_000);

    expect(result.ok).toBe(true);
    expect(result.output).toBe('2');
  });

  it('keeps a carriage return before the newline', async () => {
    const interpreter = await fakeInterpreter("printf '2\\r\\n'");

    const result = await queryInterpreterMajorVersion(interpreter, 5_000);

    expect(result.ok).toBe(true);
    expect(result.output).toBe('2\r');
  });

  it('keeps captured stdout when the interpreter exits non-zero', async () => {
    const interpreter = await fakeInterpreter("printf '2\\n'; exit 3");

    const result = await queryInterpreterMajorVersion(interpreter, 5_000);

    expect(result.ok).toBe(false);
    expect(result.output).toBe('2');
    expect(result.detail).toBe(`${interpreter} version query failed (exited with code 3).`);
  });

  it('reports empty output when the interpreter cannot be started', async () => {
    const missing = path.join(os.tmpdir(), 'report-gate-no-such-python');

    const result = await queryInterpreterMajorVersion(missing, 5_000);

    expect(result.ok).toBe(false);
    expect(result.output).toBe('');
    expect(result.detail).toMatch(/ENOENT/);
  });
});
