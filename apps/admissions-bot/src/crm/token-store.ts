import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';

export const TokenSetSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  /** Epoch milliseconds; null when unknown */
  expiresAt: z.number().nullable(),
});

export type TokenSet = z.infer<typeof TokenSetSchema>;

export interface TokenStore {
  load(): TokenSet | null;
  save(tokens: TokenSet): void;
}

/** Keeps refreshed OAuth tokens across restarts in a small JSON file */
export class FileTokenStore implements TokenStore {
  constructor(private readonly path: string) {}

  load(): TokenSet | null {
    if (!existsSync(this.path)) return null;
    try {
      const parsed = TokenSetSchema.safeParse(JSON.parse(readFileSync(this.path, 'utf8')));
      return parsed.success ? parsed.data : null;
    } catch {
      // unreadable cache: fall back to the configured tokens
      return null;
    }
  }

  save(tokens: TokenSet): void {
    writeFileSync(this.path, JSON.stringify(tokens), { mode: 0o600 });
  }
}

export class MemoryTokenStore implements TokenStore {
  constructor(private tokens: TokenSet | null = null) {}

  load(): TokenSet | null {
    return this.tokens;
  }

  save(tokens: TokenSet): void {
    this.tokens = tokens;
  }
}
