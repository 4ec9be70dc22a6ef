import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { runCommand, type CommandOutput } from '@/commands/shared/CommandRunner.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

function captureOutput(): CommandOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

void describe('runCommand', () => {
  void it('renders success with the formatter', async () => {
    const output = captureOutput();

    const exitCode = await runCommand(
      () => ({ success: true, data: { size: '10x10' } }),
      {},
      (data) => `Size: ${data.size}`,
      output
    );

    assert.equal(exitCode, EXIT_CODES.SUCCESS);
    assert.deepEqual(output.out, ['Size: 10x10']);
    assert.deepEqual(output.err, []);
  });

  void it('wraps success data in a JSON envelope with --json', async () => {
    const output = captureOutput();

    await runCommand(
      () => ({ success: true, data: { size: '10x10' } }),
      { json: true },
      () => 'unused',
      output
    );

    assert.deepEqual(JSON.parse(output.out.join('\n')), {
      version: VERSION,
      success: true,
      data: { size: '10x10' },
    });
  });

  void it('maps a thrown CommandError to its exit code and suggestion', async () => {
    const output = captureOutput();

    const exitCode = await runCommand(
      () => {
        throw new CommandError('Bad width', { suggestion: 'Use 1..10' }, EXIT_CODES.INVALID_ARGUMENTS);
      },
      {},
      undefined,
      output
    );

    assert.equal(exitCode, EXIT_CODES.INVALID_ARGUMENTS);
    assert.deepEqual(output.err, ['Error: Bad width\nSuggestion: Use 1..10']);
    assert.deepEqual(output.out, []);
  });

  void it('reports errors as JSON on stdout with --json', async () => {
    const output = captureOutput();

    await runCommand(
      () => {
        throw new CommandError('Unknown node: "x"', { suggestion: 'Try nodes list' }, 83);
      },
      { json: true },
      undefined,
      output
    );

    assert.deepEqual(JSON.parse(output.out.join('\n')), {
      version: VERSION,
      success: false,
      error: 'Unknown node: "x"',
      exitCode: 83,
      suggestion: 'Try nodes list',
    });
  });

  void it('treats other exceptions as unhandled', async () => {
    const output = captureOutput();

    const exitCode = await runCommand(
      async () => {
        await Promise.resolve();
        throw new TypeError('boom');
      },
      {},
      undefined,
      output
    );

    assert.equal(exitCode, EXIT_CODES.UNHANDLED_EXCEPTION);
    assert.deepEqual(output.err, ['Error: boom']);
  });

  void it('defaults a failure result without exit code to generic failure', async () => {
    const output = captureOutput();

    const exitCode = await runCommand(
      () => ({ success: false, error: 'nope' }),
      {},
      undefined,
      output
    );

    assert.equal(exitCode, EXIT_CODES.GENERIC_FAILURE);
    assert.deepEqual(output.err, ['Error: nope']);
  });
});
