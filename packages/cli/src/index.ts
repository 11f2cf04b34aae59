#!/usr/bin/env node
/**
 * txncfg - checks the //! directives of a transaction test script.
 *
 * - CLI handles all file I/O (uses node:fs)
 * - Core receives script text, returns configs or throws DirectiveError
 * - Core has no file system access, no console.* calls
 */

import { run } from './run.js';

process.exit(run(process.argv.slice(2)));
