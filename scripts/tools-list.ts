#!/usr/bin/env tsx
/**
 * Dev-only CLI script to list what every configured tool endpoint publishes.
 *
 * In-process endpoints (catalog, emissions) are always listed; remote ones
 * come from REMOTE_TOOL_ENDPOINTS.
 *
 * Usage:
 *   npm run tools:list            # Tool names and descriptions
 *   npm run tools:list -- --full  # Also input schemas, resources and prompts
 */

import { config } from '../src/config.js';
import { createServices } from '../src/server.js';
import { InMemorySessionStore } from '../src/session/InMemorySessionStore.js';
import type { EndpointCatalog } from '../src/transport/ToolTransportClient.js';
import type { ToolDescriptor } from '../src/transport/jsonRpc.js';

const FULL_FLAG = '--full';

function printUsage(): void {
  console.log('Usage: tsx scripts/tools-list.ts [--full]');
  console.log('');
  console.log('Options:');
  console.log('  --full    Print input schemas, resources and prompt templates');
}

function printToolSummary(tool: ToolDescriptor): void {
  console.log(`  ${tool.name}`);
  console.log(`    ${tool.description}`);
}

function printEndpointFull(catalog: EndpointCatalog): void {
  for (const tool of catalog.tools) {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`Tool: ${tool.name}`);
    console.log(`${'='.repeat(60)}`);
    console.log(`Description: ${tool.description}`);
    console.log('\nInput Schema:');
    console.log(JSON.stringify(tool.inputSchema, null, 2));
  }
  if (catalog.resources.length > 0) {
    console.log('\nResources:');
    for (const resource of catalog.resources) {
      console.log(`  ${resource.uri} (${resource.mimeType ?? 'text/plain'})`);
    }
  }
  if (catalog.prompts.length > 0) {
    console.log('\nPrompts:');
    for (const prompt of catalog.prompts) {
      const args = prompt.arguments.map((arg) => (arg.required ? arg.name : `${arg.name}?`)).join(', ');
      console.log(`  ${prompt.name}(${args})`);
    }
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const showFull = args.includes(FULL_FLAG);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const store = new InMemorySessionStore({ ttlSeconds: config.session.ttlSeconds });
  const { transport } = await createServices(store);

  try {
    for (const endpointId of transport.endpoints()) {
      const info = await transport.initialize(endpointId);
      const catalog = await transport.discover(endpointId);
      console.log(`\n${endpointId} (${info.name} ${info.version}): ${catalog.tools.length} tool(s)\n`);

      if (showFull) {
        printEndpointFull(catalog);
      } else {
        catalog.tools.forEach(printToolSummary);
      }
    }
    if (!showFull) {
      console.log('\nRun with --full flag to see input schemas.');
    }
  } catch (error) {
    console.error('\nError:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    store.destroy();
  }
}

void main();
