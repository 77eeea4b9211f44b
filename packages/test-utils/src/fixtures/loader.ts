/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the fixtures directory
 * Works whether running from src or dist
 */
function getFixturesRoot(): string {
  // Compiled code lives in dist/fixtures; the fixture files stay in src/fixtures
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures');
  }

  return __dirname;
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Load a PBN fixture file from fixtures/boards synchronously
 */
export function loadPbnSync(name: string): string {
  return fs.readFileSync(getFixturePath(path.join('boards', name)), 'utf-8');
}

/**
 * Load a JSON fixture file synchronously
 *
 * The parsed value is returned as `unknown`; callers validate or narrow it.
 */
export function loadJsonSync(relativePath: string): unknown {
  const content = fs.readFileSync(getFixturePath(relativePath), 'utf-8');
  return JSON.parse(content);
}
