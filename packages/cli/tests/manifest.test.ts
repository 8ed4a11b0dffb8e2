import { describe, it, expect } from '@jest/globals';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

const ROOT = join(__dirname, '..', '..', '..');

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf8'));
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/** `./src/smf/index.ts` -> `./dist/smf/index.js` */
function emitted(source: string): string {
  return source.replace(/^\.\/src\//, './dist/').replace(/\.ts$/, '.js');
}

describe.each(['engine', 'cli'])('packages/%s', name => {
  const dir = join(ROOT, 'packages', name);
  const manifest = readJson(join(dir, 'package.json'));
  const compilerOptions = field(readJson(join(dir, 'tsconfig.json')), 'compilerOptions');

  it('compiles src into dist', () => {
    expect(field(compilerOptions, 'rootDir')).toBe('src');
    expect(field(compilerOptions, 'outDir')).toBe('dist');
  });

  it('loads every export from emitted JavaScript and types it from source', () => {
    const exportsMap = field(manifest, 'exports');
    const targets = typeof exportsMap === 'object' && exportsMap !== null ? Object.values(exportsMap) : [];
    expect(targets.length).toBeGreaterThan(0);
    for (const target of targets) {
      const types = field(target, 'types');
      if (typeof types !== 'string') throw new Error(`export without a types path in packages/${name}`);
      expect(existsSync(join(dir, types))).toBe(true);
      expect(field(target, 'default')).toBe(emitted(types));
    }
    expect(field(manifest, 'main')).toBe('./dist/index.js');
  });
});

describe('pianolog bin', () => {
  it('runs the compiled entry point', () => {
    expect(field(field(readJson(join(ROOT, 'package.json')), 'bin'), 'pianolog')).toBe('packages/cli/dist/main.js');
    expect(field(field(readJson(join(ROOT, 'packages', 'cli', 'package.json')), 'bin'), 'pianolog')).toBe('./dist/main.js');
    expect(existsSync(join(ROOT, 'packages', 'cli', 'src', 'main.ts'))).toBe(true);
  });

  it('builds the engine before the cli', () => {
    const scripts = field(readJson(join(ROOT, 'package.json')), 'scripts');
    expect(field(scripts, 'build')).toBe('tsc -b packages/engine packages/cli');
  });
});
