import { describe, it, expect } from 'vitest';
import { buildTransactionConfig, isStageDisabled } from '../../src/directive/config.js';
import { parseEntry } from '../../src/directive/entry.js';
import type { Entry } from '../../src/directive/entry.js';
import type { GlobalConfig } from '../../src/types/index.js';

const ALICE = '0x000000000000000000000000000a11ce';
const CAROL = '0x00000000000000000000000000000ca0';

function makeGlobalConfig(): GlobalConfig {
    return {
        accounts: new Map([['alice', { address: ALICE }]]),
        genesisAccounts: new Map([['carol', { address: CAROL }]]),
    };
}

function entries(...lines: string[]): Entry[] {
    return lines.map(parseEntry);
}

describe('buildTransactionConfig', () => {
    const globalConfig = makeGlobalConfig();

    it('applies defaults for an empty block', () => {
        const config = buildTransactionConfig(globalConfig, []);

        expect(config.sender).toBe('default');
        expect(config.args).toEqual([]);
        expect(config.maxGas).toBeUndefined();
        expect(config.sequenceNumber).toBeUndefined();
        expect(config.disabledStages.size).toBe(0);
    });

    it('builds every option', () => {
        const config = buildTransactionConfig(
            globalConfig,
            entries(
                '//! sender: ALICE',
                '//! args: {{alice}}, 42',
                '//! no-run: verifier',
                '//! max-gas: 100',
                '//! sequence-number: 5'
            )
        );

        expect(config.sender).toBe('alice');
        expect(config.args).toEqual([
            { type: 'address', value: ALICE },
            { type: 'u64', value: 42n },
        ]);
        expect([...config.disabledStages]).toEqual(['verifier']);
        expect(config.maxGas).toBe(100n);
        expect(config.sequenceNumber).toBe(5n);
    });

    it('returns a frozen config', () => {
        const config = buildTransactionConfig(globalConfig, entries('//! args: 1'));
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.args)).toBe(true);
    });

    it('rejects changes to the disabled stages', () => {
        const config = buildTransactionConfig(globalConfig, entries('//! no-run: verifier'));
        const stages = config.disabledStages;
        if (!(stages instanceof Set)) {
            throw new Error('expected a Set');
        }

        expect(() => stages.add('runtime')).toThrow('disabled stages are read-only');
        expect(() => stages.delete('verifier')).toThrow('disabled stages are read-only');
        expect(() => stages.clear()).toThrow('disabled stages are read-only');
        expect([...config.disabledStages]).toEqual(['verifier']);
        expect(Object.isFrozen(stages)).toBe(true);
    });

    describe('sender', () => {
        it('accepts genesis accounts', () => {
            const config = buildTransactionConfig(globalConfig, entries('//! sender: carol'));
            expect(config.sender).toBe('carol');
        });

        it('rejects unknown accounts', () => {
            expect(() => buildTransactionConfig(globalConfig, entries('//! sender: bob'))).toThrow(
                "account 'bob' does not exist"
            );
        });

        it('rejects a second sender even with the same name', () => {
            expect(() =>
                buildTransactionConfig(globalConfig, entries('//! sender: alice', '//! sender: alice'))
            ).toThrow('sender already set');
        });

        it('reports the repeat before checking the second name', () => {
            expect(() =>
                buildTransactionConfig(globalConfig, entries('//! sender: alice', '//! sender: bob'))
            ).toThrow('sender already set');
        });
    });

    describe('args', () => {
        it('keeps self-contained arguments unchanged', () => {
            const config = buildTransactionConfig(globalConfig, entries('//! args: 7u8, false, x"0aff"'));
            expect(config.args).toEqual([
                { type: 'u8', value: 7 },
                { type: 'bool', value: false },
                { type: 'u8vector', value: new Uint8Array([0x0a, 0xff]) },
            ]);
        });

        it('resolves references against regular accounts only', () => {
            expect(() => buildTransactionConfig(globalConfig, entries('//! args: {{carol}}'))).toThrow(
                "account 'carol' does not exist"
            );
        });

        it('rejects unknown references', () => {
            expect(() => buildTransactionConfig(globalConfig, entries('//! args: 1, {{bob}}'))).toThrow(
                "account 'bob' does not exist"
            );
        });

        it('rejects a second args directive', () => {
            expect(() => buildTransactionConfig(globalConfig, entries('//! args:', '//! args: 1'))).toThrow(
                'transaction arguments already set'
            );
        });
    });

    describe('no-run', () => {
        it('collects stages across directives', () => {
            const config = buildTransactionConfig(
                globalConfig,
                entries('//! no-run: verifier', '//! no-run: runtime, compiler')
            );
            expect(config.disabledStages).toEqual(new Set(['verifier', 'runtime', 'compiler']));
        });

        it('rejects a stage repeated within one directive', () => {
            expect(() => buildTransactionConfig(globalConfig, entries('//! no-run: runtime, runtime'))).toThrow(
                "duplicate stage 'runtime' in black list"
            );
        });

        it('rejects a stage repeated across directives', () => {
            expect(() =>
                buildTransactionConfig(globalConfig, entries('//! no-run: verifier', '//! no-run: verifier'))
            ).toThrow("duplicate stage 'verifier' in black list");
        });
    });

    it('rejects a second max-gas whatever its value', () => {
        expect(() =>
            buildTransactionConfig(globalConfig, entries('//! max-gas: 100', '//! max-gas: 200'))
        ).toThrow('max gas amount already set');
        expect(() =>
            buildTransactionConfig(globalConfig, entries('//! max-gas: 100', '//! max-gas: 100'))
        ).toThrow('max gas amount already set');
    });

    it('rejects a second sequence-number', () => {
        expect(() =>
            buildTransactionConfig(globalConfig, entries('//! sequence-number: 0', '//! sequence-number: 1'))
        ).toThrow('sequence number already set');
    });

    it('accepts zero as a set value', () => {
        const config = buildTransactionConfig(globalConfig, entries('//! max-gas: 0', '//! sequence-number: 0'));
        expect(config.maxGas).toBe(0n);
        expect(config.sequenceNumber).toBe(0n);
    });

    it('does not check that the default sender exists', () => {
        const empty: GlobalConfig = { accounts: new Map(), genesisAccounts: new Map() };
        expect(buildTransactionConfig(empty, []).sender).toBe('default');
    });

    it('does not resolve names inherited from Object.prototype', () => {
        expect(() => buildTransactionConfig(globalConfig, entries('//! sender: constructor'))).toThrow(
            "account 'constructor' does not exist"
        );
    });

    it('leaves the registry untouched', () => {
        const registry = makeGlobalConfig();
        buildTransactionConfig(registry, entries('//! sender: alice', '//! args: {{alice}}'));
        expect(registry.accounts).toEqual(new Map([['alice', { address: ALICE }]]));
        expect(registry.genesisAccounts.size).toBe(1);
    });
});

describe('isStageDisabled', () => {
    it('reports disabled stages', () => {
        const config = buildTransactionConfig(makeGlobalConfig(), entries('//! no-run: serializer'));
        expect(isStageDisabled(config, 'serializer')).toBe(true);
        expect(isStageDisabled(config, 'runtime')).toBe(false);
    });
});
