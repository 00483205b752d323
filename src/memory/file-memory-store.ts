/**
 * File-backed environment and memory.
 *
 * Repository layout read by the context builder:
 *   prompts/SYSTEM.md, BIBLE.md, VERSION, README.md, .git/HEAD
 *
 * Drive layout:
 *   memory/scratchpad.md
 *   memory/identity.md
 *   memory/knowledge/index.md
 *   memory/knowledge/model-whitelist.txt
 *   state/state.json
 *   logs/*.jsonl
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { formatError } from '../errors/index.js';
import type { EnvironmentAccessors, MemoryStore } from '../core/context-builder.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import { resolveWithin } from '../paths.js';

const log = createComponentLogger('FileMemory');

export const DRIVE_PATHS = {
  scratchpad: 'memory/scratchpad.md',
  identity: 'memory/identity.md',
  knowledgeIndex: 'memory/knowledge/index.md',
  modelWhitelist: 'memory/knowledge/model-whitelist.txt',
  state: 'state/state.json',
} as const;

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Read a UTF-8 file under `root`. Missing files and paths outside `root`
 * read as undefined; other failures are logged and also read as undefined.
 */
export async function readTextWithin(root: string, relPath: string): Promise<string | undefined> {
  const full = resolveWithin(root, relPath);
  if (!full) return undefined;
  try {
    return await readFile(full, 'utf-8');
  } catch (err) {
    if (!isMissing(err)) {
      log.warn('Could not read file', { path: full, error: formatError(err) });
    }
    return undefined;
  }
}

export async function modifiedAtWithin(root: string, relPath: string): Promise<number | undefined> {
  const full = resolveWithin(root, relPath);
  if (!full) return undefined;
  try {
    return (await stat(full)).mtimeMs;
  } catch (err) {
    if (!isMissing(err)) {
      log.warn('Could not stat file', { path: full, error: formatError(err) });
    }
    return undefined;
  }
}

/**
 * Describe HEAD as `branch@sha` (12-char sha), `branch` when the ref is
 * unborn, or the bare sha when detached.
 */
export async function readRepoHead(repoDir: string): Promise<string | undefined> {
  const head = (await readTextWithin(repoDir, join('.git', 'HEAD')))?.trim();
  if (!head) return undefined;

  const ref = /^ref:\s*(\S+)$/.exec(head)?.[1];
  if (!ref) return head.slice(0, 12);

  const branch = ref.replace(/^refs\/heads\//, '');
  const sha = (await readTextWithin(repoDir, join('.git', ref)))?.trim();
  return sha ? `${branch}@${sha.slice(0, 12)}` : branch;
}

export class FileEnvironment implements EnvironmentAccessors {
  constructor(
    private readonly repoDir: string,
    private readonly driveDir: string,
    private readonly clock: () => number = Date.now
  ) {}

  readRepoFile(relPath: string): Promise<string | undefined> {
    return readTextWithin(this.repoDir, relPath);
  }

  readDriveFile(relPath: string): Promise<string | undefined> {
    return readTextWithin(this.driveDir, relPath);
  }

  repoHead(): Promise<string | undefined> {
    return readRepoHead(this.repoDir);
  }

  now(): number {
    return this.clock();
  }
}

export class FileMemoryStore implements MemoryStore {
  constructor(private readonly driveDir: string) {}

  readScratchpad(): Promise<string | undefined> {
    return readTextWithin(this.driveDir, DRIVE_PATHS.scratchpad);
  }

  readIdentity(): Promise<string | undefined> {
    return readTextWithin(this.driveDir, DRIVE_PATHS.identity);
  }

  identityUpdatedAt(): Promise<number | undefined> {
    return modifiedAtWithin(this.driveDir, DRIVE_PATHS.identity);
  }

  readKnowledgeIndex(): Promise<string | undefined> {
    return readTextWithin(this.driveDir, DRIVE_PATHS.knowledgeIndex);
  }

  readState(): Promise<string | undefined> {
    return readTextWithin(this.driveDir, DRIVE_PATHS.state);
  }
}

/**
 * In-memory stand-in with fixed contents, for tests and dry runs.
 */
export class StaticMemoryStore implements MemoryStore {
  constructor(
    private readonly contents: {
      scratchpad?: string;
      identity?: string;
      identityUpdatedAt?: number;
      knowledgeIndex?: string;
      state?: string;
    } = {}
  ) {}

  async readScratchpad(): Promise<string | undefined> {
    return this.contents.scratchpad;
  }

  async readIdentity(): Promise<string | undefined> {
    return this.contents.identity;
  }

  async identityUpdatedAt(): Promise<number | undefined> {
    return this.contents.identityUpdatedAt;
  }

  async readKnowledgeIndex(): Promise<string | undefined> {
    return this.contents.knowledgeIndex;
  }

  async readState(): Promise<string | undefined> {
    return this.contents.state;
  }
}
