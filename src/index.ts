#!/usr/bin/env tsx
/**
 * vee - Minimal Modal Terminal Editor
 *
 * Entry point for the application.
 */

import { runEditor } from './main.ts';

const VERSION = '0.1.0';

// Parse command line arguments
const args = process.argv.slice(2);

// Handle help flag
if (args.includes('--help') || args.includes('-h')) {
  console.log(`
vee - Minimal Modal Terminal Editor

Usage: vee [options]

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  --debug                 Enable debug logging to debug.log

Keys:
  normal mode   q quit, i insert mode, d/Delete delete character
  insert mode   Esc or Alt+i normal mode, Enter, Backspace, Tab, text
  any mode      arrow keys move the cursor

Settings are read from ~/.vee/settings.jsonc and ./.vee/settings.jsonc.
`);
  process.exit(0);
}

// Handle version flag
if (args.includes('--version') || args.includes('-v')) {
  console.log(`vee v${VERSION}`);
  process.exit(0);
}

runEditor({ debug: args.includes('--debug') })
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Failed to start vee:', error);
    process.exit(1);
  });
