import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { formatCommand, reportError } from '../../src/cli/output';
import { PackagerError } from '../../src/cli/errors';
import { quietConsole } from '../helpers/sandbox';

describe('formatCommand', () => {
    test('quotes arguments that contain spaces', () => {
        expect(formatCommand('jpackage', ['--description', 'A Java application.', '--win-menu'])).toBe(
            'jpackage --description "A Java application." --win-menu'
        );
    });
});

describe('reportError', () => {
    beforeEach(() => {
        quietConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('prints the code, the tool exit code and the hint', () => {
        reportError(new PackagerError('BuildFailed', 'Maven build failed with exit code 1', { exitCode: 1, hint: 'Fix it.' }));
        const lines = jest.mocked(console.error).mock.calls.map((args) => args.map(String).join(' '));
        expect(lines).toHaveLength(3);
        expect(lines[0]).toContain('[BuildFailed] Maven build failed with exit code 1');
        expect(lines[1]).toContain('tool exit code: 1');
        expect(lines[2]).toContain('Fix it.');
    });

    test('prints only the message for other errors', () => {
        reportError(new Error('boom'));
        const calls = jest.mocked(console.error).mock.calls;
        expect(calls).toHaveLength(1);
        expect(calls[0][1]).toBe('boom');
    });
});
