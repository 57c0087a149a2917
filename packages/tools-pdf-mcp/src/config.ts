import process from 'node:process';
import type { ToolExecuteOptions } from '@pagecut/tools-core';
import yargs from 'yargs';
import { z } from 'zod';

const ServerConfigSchema = z.object({
  workspaceRoot: z.string().min(1, 'workspace-root cannot be empty.'),
  allowOutsideWorkspace: z.boolean(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Parses the server flags. Each flag may also be set through the environment,
 * e.g. `PDF_TOOLS_WORKSPACE_ROOT=/data`.
 */
export async function loadServerConfig(argv: string[]): Promise<ServerConfig> {
  const args = await yargs(argv)
    .env('PDF_TOOLS')
    .option('workspace-root', {
      type: 'string',
      default: process.cwd(),
      description: 'Directory that relative file paths are resolved against',
    })
    .option('allow-outside-workspace', {
      type: 'boolean',
      default: true,
      description: 'Accept absolute paths and paths that leave the workspace root',
    })
    .strict()
    .help()
    .alias('h', 'help')
    .parseAsync();

  const parsed = ServerConfigSchema.safeParse({
    workspaceRoot: args.workspaceRoot,
    allowOutsideWorkspace: args.allowOutsideWorkspace,
  });
  if (!parsed.success) {
    const errorMessages = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${errorMessages}`);
  }
  return parsed.data;
}

export function toToolOptions(config: ServerConfig): ToolExecuteOptions {
  return {
    workspaceRoot: config.workspaceRoot,
    allowOutsideWorkspace: config.allowOutsideWorkspace,
  };
}
