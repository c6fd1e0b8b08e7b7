#!/usr/bin/env node
/**
 * workflow-columns-mcp server entry point.
 *
 * Thin shell: parses the command line, builds the server and connects it
 * to stdio.
 *
 * CLI usage:
 *   workflow-columns-mcp [options]
 *
 * Options:
 *   --debug-level <n>   Layout diagnostics on stderr (0 = off, 1 = steps, 2 = traces)
 *   --help              Show usage information
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer, SERVER_NAME } from './server';
import { ENV_DEBUG_LEVEL } from './layout/layout-logger';

// ── CLI argument parsing ───────────────────────────────────────────────────

export interface CliOptions {
  debugLevel?: number;
}

function printUsage(): void {
  console.error(`Usage: ${SERVER_NAME} [options]

Options:
  --debug-level <n>     Layout diagnostics written to stderr.
                        0 = silent (default), 1 = pipeline steps and summaries,
                        2 = per-node and per-link traces.
                        Defaults to the WORKFLOW_LAYOUT_DEBUG environment variable.
  --help                Show this help message and exit.

Examples:
  ${SERVER_NAME}
  ${SERVER_NAME} --debug-level 1

MCP configuration (.vscode/mcp.json):
  {
    "servers": {
      "workflow-layout": {
        "command": "npx",
        "args": ["${SERVER_NAME}", "--debug-level", "1"]
      }
    }
  }
`);
}

function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2); // skip node + script
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--debug-level': {
        const raw = args[++i];
        const level = raw === undefined ? NaN : Number(raw);
        if (!Number.isInteger(level) || level < 0) {
          console.error('Error: --debug-level requires a non-negative integer');
          process.exit(1);
        }
        options.debugLevel = level;
        break;
      }
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Unknown option: ${args[i]}`);
        printUsage();
        process.exit(1);
    }
  }

  return options;
}

async function main() {
  const options = parseArgs(process.argv);
  const debugLevel = options.debugLevel ?? ENV_DEBUG_LEVEL;
  if (debugLevel > 0) console.error(`Layout debug level set to: ${debugLevel}`);

  const server = createServer({ debugLevel });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} server running on stdio`);
}

main().catch((error: unknown) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
