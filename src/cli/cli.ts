#!/usr/bin/env node
import { main } from '../index.js';

/**
 * True when this file is the process entry point. Node resolves the bin
 * symlink, so direct execution and the installed bin both land here.
 */
export function isMainModule(entry: NodeJS.Module | undefined = require.main): boolean {
  return entry === module;
}

if (isMainModule()) {
  main().catch((error: unknown) => {
    console.error('Failed to start MCP server:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
