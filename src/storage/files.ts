/**
 * File-system side of tracegraph: project discovery, the config file and
 * reading source units. Everything is read before ingestion starts.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { dirname, extname, join, relative, sep } from 'path';
import { parse } from 'yaml';
import { resolveConfig, type GraphConfig } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { logDebug, logWarning } from '../core/logger.js';
import type { SourceDomain, SourceUnit } from '../parsers/types.js';

/**
 * Config file name, looked up from the working directory upwards.
 */
export const CONFIG_FILE = '.tracegraph.yaml';

/** Domains in the order their directories are scanned; a file joins the first. */
const DOMAIN_ORDER: readonly SourceDomain[] = ['spec', 'test', 'code', 'result'];

/**
 * Find the project root directory by walking up from cwd.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, CONFIG_FILE))) {
      return dir;
    }
    dir = dirname(dir);
  }
  return existsSync(join(dir, CONFIG_FILE)) ? dir : null;
}

/**
 * Load and validate the project's config file. Without a root or a file,
 * the defaults apply.
 */
export function loadConfigFile(root: string | null): GraphConfig {
  if (root === null) return resolveConfig();
  const configPath = join(root, CONFIG_FILE);
  if (!existsSync(configPath)) return resolveConfig({}, null);

  let raw: unknown;
  try {
    raw = parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${configPath}: ${message}`, configPath);
  }
  return resolveConfig(raw ?? {}, configPath);
}

/**
 * List files below a directory recursively, in sorted order.
 */
export function listFiles(dir: string, skipDirs: readonly string[]): string[] {
  const files: string[] = [];

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (!skipDirs.includes(entry.name)) walkDir(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  if (existsSync(dir)) {
    walkDir(dir);
  }

  return files;
}

/**
 * Read every source file the config names, tagged with its domain. Paths
 * are relative to the root and use `/`.
 */
export function collectSourceUnits(root: string, config: GraphConfig): SourceUnit[] {
  const { sources } = config;
  const seen = new Set<string>();
  const units: SourceUnit[] = [];

  for (const domain of DOMAIN_ORDER) {
    const extensions = sources.extensions[domain];
    for (const dir of sources[domain]) {
      for (const fullPath of listFiles(join(root, dir), sources.skipDirs)) {
        const name = fullPath.slice(fullPath.lastIndexOf(sep) + 1);
        if (!extensions.includes(extname(fullPath)) || sources.skipFiles.includes(name)) continue;

        const path = relative(root, fullPath).split(sep).join('/');
        if (seen.has(path)) continue;
        seen.add(path);

        try {
          units.push({ path, domain, content: readFileSync(fullPath, 'utf-8') });
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logWarning(`Skipping unreadable file ${path}`, { error: message });
        }
      }
    }
  }

  logDebug('Collected source units', { root, units: units.length });
  return units;
}
