import { readFile } from 'node:fs/promises';

import { describe, expect, it } from 'vitest';

const root = new URL('../', import.meta.url);

async function readJson(name: string): Promise<unknown> {
  return JSON.parse(await readFile(new URL(name, root), 'utf8'));
}

describe('build configuration', () => {
  it('compiles only the sources into dist', async () => {
    expect(await readJson('tsconfig.build.json')).toEqual({
      extends: './tsconfig.json',
      compilerOptions: { rootDir: 'src', outDir: 'dist' },
      include: ['src/**/*.ts']
    });
  });

  it('points the bin and the build script at the source-only output', async () => {
    expect(await readJson('package.json')).toMatchObject({
      bin: { shuttle: 'dist/cli/index.js' },
      scripts: { build: 'tsc -p tsconfig.build.json', typecheck: 'tsc --noEmit' }
    });
  });
});
