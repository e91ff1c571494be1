/**
 * Help Topic Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ERROR_DESCRIPTIONS } from 'linepipe-core';
import { executeTopic, getTopicText, HELP_TOPICS, isHelpTopic } from '../../src/commands/topic';

describe('Help Topics', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should recognize every topic name', () => {
        for (const topic of HELP_TOPICS) {
            expect(isHelpTopic(topic)).toBe(true);
        }
        expect(isHelpTopic('ops')).toBe(false);
    });

    it('should list exit codes in order', () => {
        const lines = getTopicText('code').split('\n');
        expect(lines).toHaveLength(19);
        expect(lines[2]).toBe('   0  SUCCESS');
        expect(lines[3]).toBe(`   1  ${'PARSE_TOKEN'.padEnd(26)}${ERROR_DESCRIPTIONS.PARSE_TOKEN}`);
        expect(lines[18]).toBe(`  16  ${'READ_STDIN'.padEnd(26)}${ERROR_DESCRIPTIONS.READ_STDIN}`);
    });

    it('should describe the output commands', () => {
        expect(getTopicText('output')).toContain(':to file <name>[ append][ lf|crlf]');
    });

    it('should print the topic to stdout', () => {
        const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
        expect(executeTopic('input')).toBe(0);
        expect(stdoutSpy).toHaveBeenCalledWith(`${getTopicText('input')}\n`);
    });
});
