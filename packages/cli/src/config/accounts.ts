import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import {
    AccountRegistryFileSchema,
    DEFAULT_SENDER,
    type AccountData,
    type AccountEntry,
    type AccountRegistryFile,
    type GlobalConfig,
} from '@txn-directives/shared';
import { deriveAddress, normalizeAddress } from '@txn-directives/core';

/**
 * Loads the account registry (accounts.yaml).
 * Without a path the registry holds only the default account.
 */
export function loadGlobalConfig(path?: string): GlobalConfig {
    if (path === undefined) {
        return toGlobalConfig(AccountRegistryFileSchema.parse({}));
    }
    if (!existsSync(path)) {
        throw new Error(`Accounts file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    // An empty file parses to null
    const data: unknown = parse(content) ?? {};

    const result = AccountRegistryFileSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid accounts file ${path}: ${issues.join('; ')}`);
    }
    return toGlobalConfig(result.data);
}

/**
 * Converts a validated registry file into lookup maps.
 * Adds the default account when the file does not define one.
 */
export function toGlobalConfig(file: AccountRegistryFile): GlobalConfig {
    const accounts = toAccountMap(file.accounts);
    const genesisAccounts = toAccountMap(file.genesis_accounts);

    if (!accounts.has(DEFAULT_SENDER) && !genesisAccounts.has(DEFAULT_SENDER)) {
        accounts.set(DEFAULT_SENDER, { address: deriveAddress(DEFAULT_SENDER) });
    }

    return { accounts, genesisAccounts };
}

function toAccountMap(entries: Record<string, AccountEntry | null>): Map<string, AccountData> {
    const map = new Map<string, AccountData>();
    for (const [name, entry] of Object.entries(entries)) {
        // Directive names are lowercased, so registry names are too
        const key = name.replace(/[A-Z]/g, (c) => c.toLowerCase());
        if (map.has(key)) {
            throw new Error(`Duplicate account name: ${key}`);
        }
        const address = entry?.address ? normalizeAddress(entry.address) : deriveAddress(key);
        map.set(key, { address });
    }
    return map;
}
