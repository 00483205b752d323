/**
 * File Memory Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DRIVE_PATHS,
  FileEnvironment,
  FileMemoryStore,
  readRepoHead,
  readTextWithin,
} from '../../src/memory/file-memory-store.js';

function writeFile(root: string, relPath: string, content: string): void {
  const full = join(root, relPath);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content, 'utf-8');
}

describe('FileMemoryStore', () => {
  let repoDir: string;
  let driveDir: string;

  beforeEach(() => {
    repoDir = mkdtempSync(join(tmpdir(), 'roundloop-repo-'));
    driveDir = mkdtempSync(join(tmpdir(), 'roundloop-drive-'));
  });

  afterEach(() => {
    rmSync(repoDir, { recursive: true, force: true });
    rmSync(driveDir, { recursive: true, force: true });
  });

  describe('memory files', () => {
    it('should read memory files from the drive layout', async () => {
      writeFile(driveDir, DRIVE_PATHS.scratchpad, 'todo: refactor');
      writeFile(driveDir, DRIVE_PATHS.identity, 'I am the loop');
      writeFile(driveDir, DRIVE_PATHS.knowledgeIndex, '- topic');
      writeFile(driveDir, DRIVE_PATHS.state, '{"owner":"x"}');
      const store = new FileMemoryStore(driveDir);

      expect(await store.readScratchpad()).toBe('todo: refactor');
      expect(await store.readIdentity()).toBe('I am the loop');
      expect(await store.readKnowledgeIndex()).toBe('- topic');
      expect(await store.readState()).toBe('{"owner":"x"}');
      expect(typeof (await store.identityUpdatedAt())).toBe('number');
    });

    it('should read missing files as undefined', async () => {
      const store = new FileMemoryStore(driveDir);

      expect(await store.readScratchpad()).toBeUndefined();
      expect(await store.identityUpdatedAt()).toBeUndefined();
    });
  });

  describe('readTextWithin', () => {
    it('should refuse paths that leave the root', async () => {
      writeFile(driveDir, 'secret.txt', 'nope');

      expect(await readTextWithin(repoDir, '../secret.txt')).toBeUndefined();
      expect(await readTextWithin(repoDir, join(driveDir, 'secret.txt'))).toBeUndefined();
    });

    it('should read a directory path as undefined', async () => {
      mkdirSync(join(repoDir, 'docs'));
      expect(await readTextWithin(repoDir, 'docs/missing.md')).toBeUndefined();
    });
  });

  describe('readRepoHead', () => {
    it('should describe a branch with its commit', async () => {
      writeFile(repoDir, '.git/HEAD', 'ref: refs/heads/main\n');
      writeFile(repoDir, '.git/refs/heads/main', '0123456789abcdef0123\n');

      expect(await readRepoHead(repoDir)).toBe('main@0123456789ab');
    });

    it('should describe an unborn branch by name', async () => {
      writeFile(repoDir, '.git/HEAD', 'ref: refs/heads/dev\n');
      expect(await readRepoHead(repoDir)).toBe('dev');
    });

    it('should describe a detached head by its commit', async () => {
      writeFile(repoDir, '.git/HEAD', 'fedcba9876543210fedc\n');
      expect(await readRepoHead(repoDir)).toBe('fedcba987654');
    });

    it('should return undefined outside a repository', async () => {
      expect(await readRepoHead(repoDir)).toBeUndefined();
    });
  });

  describe('FileEnvironment', () => {
    it('should read from the repository and drive roots', async () => {
      writeFile(repoDir, 'BIBLE.md', 'rules');
      writeFile(driveDir, 'state/state.json', '{}');
      const env = new FileEnvironment(repoDir, driveDir, () => 42);

      expect(await env.readRepoFile('BIBLE.md')).toBe('rules');
      expect(await env.readDriveFile('state/state.json')).toBe('{}');
      expect(await env.readRepoFile('state/state.json')).toBeUndefined();
      expect(env.now()).toBe(42);
    });
  });
});
