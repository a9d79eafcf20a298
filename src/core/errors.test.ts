import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigError, LintError, ReadAbortError, logError } from './errors';
import { MemoryLogger } from './logger';

describe('LintError', () => {
    it('appends the hint in toString', () => {
        assert.strictEqual(new LintError('boom', 'try again').toString(), 'boom\nHint: try again');
        assert.strictEqual(new LintError('boom').toString(), 'boom');
    });

    it('builds hints for subclasses', () => {
        assert.strictEqual(new ConfigError('bad', '/ws/c.json').recoveryHint, 'Fix or remove /ws/c.json.');
        assert.strictEqual(new ConfigError('bad').recoveryHint, 'Check the command-line options.');

        const abort = new ReadAbortError('/r/a.md', 'EACCES');
        assert.strictEqual(abort.message, '/r/a.md could not be read: EACCES');
        assert.strictEqual(abort.name, 'ReadAbortError');
        assert.ok(abort instanceof LintError);
    });
});

describe('logError', () => {
    it('logs message and hint to stderr', () => {
        const logger = new MemoryLogger();
        logError(logger, new ConfigError('Invalid options: maxLength: too small'));

        assert.deepStrictEqual(logger.stderr, [
            '[ERROR] Invalid options: maxLength: too small',
            'Hint: Check the command-line options.'
        ]);
        assert.deepStrictEqual(logger.stdout, []);
    });

    it('logs plain errors without a hint', () => {
        const logger = new MemoryLogger();
        logError(logger, new Error('plain'));
        assert.deepStrictEqual(logger.stderr, ['[ERROR] plain']);
    });
});
