/**
 * Tests for project discovery and source collection.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { resolveConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';
import {
  CONFIG_FILE,
  collectSourceUnits,
  findProjectRoot,
  listFiles,
  loadConfigFile,
} from '../../src/storage/files.js';

const FIXTURE_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures', 'project');

function write(root: string, path: string, content: string): void {
  const full = join(root, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

describe('findProjectRoot', () => {
  it('should find the config file from a subdirectory', () => {
    expect(findProjectRoot(join(FIXTURE_ROOT, 'spec'))).toBe(FIXTURE_ROOT);
    expect(findProjectRoot(FIXTURE_ROOT)).toBe(FIXTURE_ROOT);
  });
});

describe('with a scratch directory', () => {
  let scratch: string;

  beforeEach(() => {
    scratch = mkdtempSync(join(tmpdir(), 'tracegraph-'));
  });

  afterEach(() => {
    rmSync(scratch, { recursive: true, force: true });
  });

  describe('loadConfigFile', () => {
    it('should read the fixture config', () => {
      const config = loadConfigFile(FIXTURE_ROOT);

      expect(config.prefix).toBe('REQ');
      expect(config.sources.result).toEqual(['results']);
      expect(config.sources.extensions.result).toEqual(['.xml']);
    });

    it('should fall back to defaults without a root or a file', () => {
      expect(loadConfigFile(null)).toEqual(resolveConfig());
      expect(loadConfigFile(scratch)).toEqual(resolveConfig());
    });

    it('should treat an empty file as defaults', () => {
      write(scratch, CONFIG_FILE, '');

      expect(loadConfigFile(scratch)).toEqual(resolveConfig());
    });

    it('should reject malformed YAML', () => {
      write(scratch, CONFIG_FILE, 'sources: [unclosed\n');

      expect(() => loadConfigFile(scratch)).toThrow(ConfigError);
    });

    it('should reject values of the wrong type', () => {
      write(scratch, CONFIG_FILE, 'strictMode: yes-please\n');

      expect(() => loadConfigFile(scratch)).toThrow(`Invalid config in ${join(scratch, CONFIG_FILE)}`);
    });
  });

  describe('listFiles', () => {
    it('should list files recursively in sorted order, skipping directories', () => {
      write(scratch, 'c.md', '');
      write(scratch, 'a/b.md', '');
      write(scratch, 'node_modules/dep.md', '');

      expect(listFiles(scratch, ['node_modules'])).toEqual([join(scratch, 'a', 'b.md'), join(scratch, 'c.md')]);
    });

    it('should return nothing for a missing directory', () => {
      expect(listFiles(join(scratch, 'missing'), [])).toEqual([]);
    });
  });

  describe('collectSourceUnits', () => {
    it('should filter by extension and skipped file names', () => {
      write(scratch, 'spec/README.md', '# Notes');
      write(scratch, 'spec/notes.txt', 'notes');
      write(scratch, 'spec/req.md', '## REQ-p00001: One');

      const units = collectSourceUnits(scratch, resolveConfig());

      expect(units).toEqual([{ path: 'spec/req.md', domain: 'spec', content: '## REQ-p00001: One' }]);
    });

    it('should read a file only once when directories overlap', () => {
      write(scratch, 'src/auth.ts', '// Implements: REQ-d00001');

      const units = collectSourceUnits(scratch, resolveConfig({ sources: { code: ['src', 'src'], test: ['src'] } }));

      expect(units.map((unit) => [unit.path, unit.domain])).toEqual([['src/auth.ts', 'test']]);
    });
  });
});

describe('collectSourceUnits on the fixture project', () => {
  it('should tag every file with its domain', () => {
    const units = collectSourceUnits(FIXTURE_ROOT, loadConfigFile(FIXTURE_ROOT));

    expect(units.map((unit) => [unit.path, unit.domain])).toEqual([
      ['spec/dev.md', 'spec'],
      ['spec/prd.md', 'spec'],
      ['tests/test_auth.py', 'test'],
      ['src/auth.py', 'code'],
      ['results/junit.xml', 'result'],
    ]);
  });
});
