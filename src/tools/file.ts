/**
 * Read-only repository and drive tools.
 *
 * Paths are relative to the repository or drive root and may not leave
 * it. All four tools carry the read-only policy, so a batch made only of
 * them runs in parallel.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { z } from 'zod';
import { ToolError } from '../errors/index.js';
import { resolveWithin } from '../paths.js';
import type { ToolContext, ToolDefinition } from './types.js';

// =============================================================================
// SHARED
// =============================================================================

const readSchema = z.object({
  path: z.string().min(1).describe('Path relative to the root'),
  max_chars: z.number().int().positive().optional().describe('Stop after this many characters'),
});

const listSchema = z.object({
  dir: z.string().default('.').describe('Directory relative to the root'),
  max_entries: z.number().int().positive().default(500).describe('Maximum entries to list'),
});

type RootOf = (context: ToolContext) => string;

function confined(tool: string, root: string, relPath: string): string {
  const full = resolveWithin(root, relPath);
  if (!full) {
    throw new ToolError(`Path '${relPath}' is outside the allowed root`, tool, { path: relPath });
  }
  return full;
}

async function readWithin(tool: string, root: string, input: z.infer<typeof readSchema>): Promise<string> {
  const full = confined(tool, root, input.path);
  const content = await readFile(full, 'utf-8');
  if (input.max_chars !== undefined && content.length > input.max_chars) {
    return `${content.slice(0, input.max_chars)}\n... (${content.length - input.max_chars} more chars)`;
  }
  return content;
}

/**
 * One entry per line, directories suffixed with `/`, sorted by name.
 */
async function listWithin(tool: string, root: string, input: z.infer<typeof listSchema>): Promise<string> {
  const full = confined(tool, root, input.dir);
  const info = await stat(full);
  if (!info.isDirectory()) {
    throw new ToolError(`'${input.dir}' is not a directory`, tool, { path: input.dir });
  }

  const entries = await readdir(full, { withFileTypes: true });
  const names = entries
    .map((e) => (e.isDirectory() ? `${e.name}/` : e.name))
    .sort((a, b) => a.localeCompare(b));

  if (names.length === 0) return '(empty directory)';
  const shown = names.slice(0, input.max_entries);
  const more = names.length - shown.length;
  return more > 0 ? `${shown.join('\n')}\n... (${more} more)` : shown.join('\n');
}

function readTool(name: string, where: string, root: RootOf): ToolDefinition<typeof readSchema> {
  return {
    name,
    description: `Read a UTF-8 text file from the ${where}.`,
    parameters: readSchema,
    policy: 'read_only',
    timeoutSec: 30,
    execute: async (input, context) => readWithin(name, root(context), input),
  };
}

function listTool(name: string, where: string, root: RootOf): ToolDefinition<typeof listSchema> {
  return {
    name,
    description: `List the entries of a directory in the ${where}.`,
    parameters: listSchema,
    policy: 'read_only',
    timeoutSec: 30,
    execute: async (input, context) => listWithin(name, root(context), input),
  };
}

// =============================================================================
// TOOLS
// =============================================================================

export const repoReadTool = readTool('repo_read', 'repository', (c) => c.repoDir);
export const repoListTool = listTool('repo_list', 'repository', (c) => c.repoDir);
export const driveReadTool = readTool('drive_read', 'drive (memory, state and logs)', (c) => c.driveDir);
export const driveListTool = listTool('drive_list', 'drive (memory, state and logs)', (c) => c.driveDir);

export interface ToolRegistrar {
  register<T extends z.ZodTypeAny>(tool: ToolDefinition<T>): void;
}

/** Register the four read-only file tools */
export function registerFileTools(registry: ToolRegistrar): void {
  registry.register(repoReadTool);
  registry.register(repoListTool);
  registry.register(driveReadTool);
  registry.register(driveListTool);
}
