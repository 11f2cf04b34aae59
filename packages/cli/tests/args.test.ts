import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
    it('returns no script for empty argv', () => {
        expect(parseArgs([])).toEqual({ script: undefined, options: {} });
    });

    it('reads the script path and accounts file', () => {
        expect(parseArgs(['test.mvir', '--accounts', 'accounts.yaml'])).toEqual({
            script: 'test.mvir',
            options: { accounts: 'accounts.yaml' },
        });
        expect(parseArgs(['-a', 'a.yaml', 'test.mvir'])).toEqual({
            script: 'test.mvir',
            options: { accounts: 'a.yaml' },
        });
    });

    it('rejects a dangling --accounts', () => {
        expect(() => parseArgs(['test.mvir', '--accounts'])).toThrow('--accounts requires a file path');
    });

    it('rejects unknown options and extra arguments', () => {
        expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
        expect(() => parseArgs(['a.mvir', 'b.mvir'])).toThrow('Unexpected argument: b.mvir');
    });
});
