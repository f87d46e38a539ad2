import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { FileTokenStore } from './token-store';

const dirs: string[] = [];

function cachePath(): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'kommo-tokens-'));
  dirs.push(dir);
  return path.join(dir, 'tokens.json');
}

afterEach(() => {
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe('FileTokenStore', () => {
  it('returns null before anything is cached', () => {
    expect(new FileTokenStore(cachePath()).load()).toBeNull();
  });

  it('reads back what it saved', () => {
    const file = cachePath();
    const tokens = { accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: 1_800_000_000_000 };
    new FileTokenStore(file).save(tokens);
    expect(new FileTokenStore(file).load()).toEqual(tokens);
  });

  it('ignores a corrupted cache', () => {
    const file = cachePath();
    writeFileSync(file, '{not json');
    expect(new FileTokenStore(file).load()).toBeNull();

    writeFileSync(file, JSON.stringify({ accessToken: '' }));
    expect(new FileTokenStore(file).load()).toBeNull();
  });
});
