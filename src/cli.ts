#!/usr/bin/env node
/**
 * asar-inject - CLI Interface
 *
 * Command-line interface for theming Electron asar archives.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
