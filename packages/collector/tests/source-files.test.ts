/**
 * Tests for source-files module - file collection and loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  collectFilePaths,
  loadSourceUnit,
  resolveUnitName,
  toRelativePath,
} from '../src/files/source-files.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import type { CollectorConfig } from '../src/types.js';

function makeConfig(overrides: Partial<CollectorConfig> = {}): CollectorConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

function createFile(basePath: string, relativePath: string, content: string | Buffer): void {
  const fullPath = join(basePath, relativePath);
  mkdirSync(join(fullPath, '..'), { recursive: true });
  writeFileSync(fullPath, content);
}

describe('source-files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sqltrail-source-files-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('collectFilePaths', () => {
    it('finds units and skips excluded folders', async () => {
      createFile(tempDir, 'src/Orders.pas', 'unit Orders;');
      createFile(tempDir, 'src/Billing.pas', 'unit Billing;');
      createFile(tempDir, 'src/__history/Orders.pas', 'unit Orders;');
      createFile(tempDir, 'Win32/Debug/Stale.pas', 'unit Stale;');
      createFile(tempDir, 'README.md', '# notes');

      const paths = await collectFilePaths({ targetPath: tempDir, config: makeConfig() });

      expect(paths).toEqual([join(tempDir, 'src/Billing.pas'), join(tempDir, 'src/Orders.pas')]);
    });

    it('uses explicit patterns over config.include', async () => {
      createFile(tempDir, 'Tool.dpr', 'program Tool;');
      createFile(tempDir, 'Main.pas', 'unit Main;');

      const paths = await collectFilePaths({ targetPath: tempDir, config: makeConfig(), patterns: ['*.dpr'] });

      expect(paths).toEqual([join(tempDir, 'Tool.dpr')]);
    });

    it('returns nothing for an empty include list', async () => {
      createFile(tempDir, 'Main.pas', 'unit Main;');

      const paths = await collectFilePaths({ targetPath: tempDir, config: makeConfig({ include: [] }) });

      expect(paths).toEqual([]);
    });
  });

  describe('resolveUnitName', () => {
    it('reads the unit header', () => {
      expect(resolveUnitName('unit Billing.Core;\ninterface', '/src/Core.pas')).toBe('Billing.Core');
      expect(resolveUnitName('program Tool;\nbegin\nend.', '/src/Tool.dpr')).toBe('Tool');
    });

    it('ignores a header inside a comment', () => {
      expect(resolveUnitName('{ unit Old; }\nunit New;', '/src/New.pas')).toBe('New');
    });

    it('falls back to the file name', () => {
      expect(resolveUnitName('procedure X;', '/src/Helpers.pas')).toBe('Helpers');
    });
  });

  describe('toRelativePath', () => {
    it('uses forward slashes', () => {
      expect(toRelativePath(join(tempDir, 'src', 'Orders.pas'), tempDir)).toBe('src/Orders.pas');
    });
  });

  describe('loadSourceUnit', () => {
    it('reads a unit with the configured encoding', async () => {
      createFile(tempDir, 'Menu.pas', Buffer.from("unit Menu;\nconst Title = 'Café';\n", 'latin1'));

      const unit = await loadSourceUnit(join(tempDir, 'Menu.pas'), tempDir, 'latin1');

      expect(unit).toEqual({
        path: join(tempDir, 'Menu.pas'),
        file: 'Menu.pas',
        unitName: 'Menu',
        source: "unit Menu;\nconst Title = 'Café';\n",
      });
    });
  });
});
