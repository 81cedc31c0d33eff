/**
 * Package Manifest Tests
 */

import { existsSync, readFileSync } from 'node:fs';

import { describe, it, expect } from 'vitest';

const manifestUrl = new URL('../package.json', import.meta.url);
const manifest: unknown = JSON.parse(readFileSync(manifestUrl, 'utf8'));

describe('package.json', () => {
  it('should point every entry at the shipped sources', () => {
    expect(manifest).toMatchObject({
      main: './src/index.ts',
      types: './src/index.ts',
      exports: { '.': { types: './src/index.ts', default: './src/index.ts' } },
    });
    expect(existsSync(new URL('../src/index.ts', import.meta.url))).toBe(true);
  });

  it('should not restrict published files to build output', () => {
    expect(manifest).not.toHaveProperty('files');
  });
});
