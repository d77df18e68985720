/**
 * Tests for CLI error reporting
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { ApiError, ErrorCode, logger } from '@mnemy/shared';

import { handleCommandError, wrapCommand } from '../../src/utils/errorHandler.js';
import {
  captureConsole,
  captureProcessExit,
  restoreConsole,
  restoreProcessExit,
} from '../helpers/testSetup.js';

describe('handleCommandError', () => {
  beforeEach(() => {
    logger.configure({ console: false, logDir: null });
  });

  afterEach(() => {
    restoreConsole();
    restoreProcessExit();
  });

  it('should print the message and recovery suggestions, then exit with 1', () => {
    const output = captureConsole();
    const exit = captureProcessExit();
    const error = new ApiError(ErrorCode.TOKEN_MISSING, 'API token not found');

    assert.throws(() => handleCommandError(error, 'testing token'), /process\.exit\(1\)/);

    assert.strictEqual(exit.exitCode, 1);
    assert.deepStrictEqual(output.errors, [
      'Error testing token: API token not found',
      '  - Save your API token with: mnemy token set <token>',
    ]);
  });

  it('should print a single JSON line in JSON mode', () => {
    const output = captureConsole();
    captureProcessExit();
    const error = new ApiError(ErrorCode.AUTH_FAILED, 'Server rejected the API token', { statusCode: 401 });

    assert.throws(() => handleCommandError(error, 'listing games', { json: true }), /process\.exit\(1\)/);

    assert.strictEqual(output.errors.length, 1);
    assert.deepStrictEqual(JSON.parse(output.errors[0]), {
      success: false,
      action: 'listing games',
      error: 'Server rejected the API token',
      code: 'AUTH_FAILED',
      type: 'api_error',
      suggestions: ['Check that the API token is correct (mnemy token set <token>)'],
    });
  });

  it('should handle plain errors without suggestions', () => {
    const output = captureConsole();
    captureProcessExit();

    assert.throws(() => handleCommandError(new Error('boom'), 'adding game', { json: true }), /process\.exit\(1\)/);

    assert.deepStrictEqual(JSON.parse(output.errors[0]), {
      success: false,
      action: 'adding game',
      error: 'boom',
      type: 'error',
      suggestions: [],
    });
  });
});

describe('wrapCommand', () => {
  afterEach(() => {
    restoreConsole();
    restoreProcessExit();
  });

  it('should pass arguments through to the action', async () => {
    const received: string[] = [];
    const action = wrapCommand('running', async (name: string) => {
      received.push(name);
    });

    await action('Celeste');

    assert.deepStrictEqual(received, ['Celeste']);
  });

  it('should route failures to handleCommandError with the derived options', async () => {
    logger.configure({ console: false, logDir: null });
    const output = captureConsole();
    const exit = captureProcessExit();
    const action = wrapCommand(
      'listing games',
      async (_options: { json?: boolean }) => {
        throw new Error('boom');
      },
      (options) => ({ json: options.json })
    );

    await assert.rejects(action({ json: true }), /process\.exit\(1\)/);

    assert.strictEqual(exit.exitCode, 1);
    assert.strictEqual(JSON.parse(output.errors[0]).action, 'listing games');
  });
});
