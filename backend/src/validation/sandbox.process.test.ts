import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { LocalProcessSandbox } from './sandbox';
import { evaluateAcceptance } from './acceptance';

// Runs the real `node --test` harness; no child_process mock here.

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe.skipIf(process.platform === 'win32')('LocalProcessSandbox with a real harness', () => {
  let tempRoot = '';
  let outside = '';

  beforeAll(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'forgeloop-sandbox-real-'));
    outside = fs.mkdtempSync(path.join(os.tmpdir(), 'forgeloop-sandbox-outside-'));
  });

  afterAll(() => {
    fs.rmSync(tempRoot, { recursive: true, force: true });
    fs.rmSync(outside, { recursive: true, force: true });
  });

  const sandbox = () => new LocalProcessSandbox({ tempRoot });

  it('accepts a suite with real passing tests', async () => {
    const tests = [
      "import { test } from 'node:test';",
      "import assert from 'node:assert/strict';",
      "import { slugify } from './slugify.mjs';",
      "test('lowercases words', () => assert.equal(slugify('Hello World'), 'hello-world'));",
      "test('keeps an empty string empty', () => assert.equal(slugify(''), ''));",
    ].join('\n');

    const result = await sandbox().execute({
      toolName: 'slugify',
      candidate: { source: "export const slugify = s => s.toLowerCase().split(' ').join('-');\n", tests },
      timeoutMs: 10_000,
    });

    expect(result.exitCode).toBe(0);
    expect(result.report).toEqual({ total: 2, passed: 2, failed: 0, failures: [] });
    expect(evaluateAcceptance(result)).toEqual({ satisfied: true });
  }, 15_000);

  it('rejects a test file that declares no tests', async () => {
    const result = await sandbox().execute({
      toolName: 'empty_suite',
      candidate: {
        source: 'export const ready = true;\n',
        tests: "import './empty_suite.mjs';\nconsole.log('no tests here');\n",
      },
      timeoutMs: 10_000,
    });

    expect(result.exitCode).toBe(0);
    expect(result.report).toEqual({ total: 0, passed: 0, failed: 0, failures: [] });
    expect(evaluateAcceptance(result)).toEqual({
      satisfied: false,
      classification: 'criteria_unmet',
      reason: '0 passing tests, at least 1 required',
    });
  }, 15_000);

  it('leaves nothing running once execute() has resolved', async () => {
    const marker = path.join(outside, 'late-write.txt');
    const writer = `setTimeout(() => require('node:fs').writeFileSync(${JSON.stringify(marker)}, 'late'), 1500)`;
    const tests = [
      "import { spawn } from 'node:child_process';",
      "import { test } from 'node:test';",
      "test('starts a background writer', () => {",
      `  spawn(process.execPath, ['-e', ${JSON.stringify(writer)}], { stdio: 'ignore' }).unref();`,
      '});',
    ].join('\n');

    const result = await sandbox().execute({
      toolName: 'background_writer',
      candidate: { source: 'export {};\n', tests },
      timeoutMs: 10_000,
    });
    await delay(2500);

    expect(result.report).toEqual({ total: 1, passed: 1, failed: 0, failures: [] });
    expect(fs.existsSync(marker)).toBe(false);
  }, 15_000);
});
