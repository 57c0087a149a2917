#!/usr/bin/env node
import { createRequire } from 'node:module';
import process from 'node:process';
import { type McpToolDefinition, startMcpServer } from '@pagecut/tools-adaptor-mcp';
import { extractPagesTool, getInfoTool } from '@pagecut/tools-pdf';
import { hideBin } from 'yargs/helpers';
import { z } from 'zod';
import { loadServerConfig, toToolOptions } from './config.js';

const PackageMetadataSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string(),
});

const require = createRequire(import.meta.url);
const { name, version, description } = PackageMetadataSchema.parse(require('../package.json'));

const tools: McpToolDefinition[] = [extractPagesTool, getInfoTool];

(async () => {
  try {
    const config = await loadServerConfig(hideBin(process.argv));
    console.error(
      `[${name}] Workspace root: ${config.workspaceRoot} (outside paths ${
        config.allowOutsideWorkspace ? 'allowed' : 'rejected'
      })`,
    );
    await startMcpServer({ name, version, description, tools }, toToolOptions(config));
  } catch (error: unknown) {
    console.error(`[${name}] Failed to start:`, error);
    process.exit(1);
  }
})();
