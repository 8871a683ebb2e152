import { createHash, timingSafeEqual } from 'node:crypto';
import { SubjectInput } from './token-store.js';

export interface Credentials {
  username: string;
  password: string;
}

/** Resolves a username/password pair to the subject a token is issued for. */
export interface IdentityDirectory {
  authenticate(credentials: Credentials): Promise<SubjectInput | null>;
}

export interface StaticAccount {
  userId: string;
  username: string;
  password: string;
  roles?: string[];
  groups?: string[];
}

const QUOTE_VARIANTS: Record<string, string> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201c': '"',
  '\u201d': '"',
};

/** NFKC, curly quotes folded to ASCII, outer whitespace trimmed. */
export const normalizePassword = (password: string): string =>
  password
    .normalize('NFKC')
    .replace(/[\u2018\u2019\u201c\u201d]/g, (quote) => QUOTE_VARIANTS[quote] ?? quote)
    .trim();

const digest = (value: string) => createHash('sha256').update(normalizePassword(value), 'utf8').digest();

export class StaticIdentityDirectory implements IdentityDirectory {
  private readonly accounts: Map<string, StaticAccount & { passwordDigest: Buffer }>;

  constructor(accounts: StaticAccount[]) {
    this.accounts = new Map(
      accounts.map((account) => [account.username, { ...account, passwordDigest: digest(account.password) }]),
    );
  }

  async authenticate({ username, password }: Credentials): Promise<SubjectInput | null> {
    const account = this.accounts.get(username);
    const expected = account?.passwordDigest ?? digest('');
    const matches = timingSafeEqual(expected, digest(password));
    if (!account || !matches) {
      return null;
    }

    return {
      userId: account.userId,
      username: account.username,
      roles: account.roles ?? [],
      groups: account.groups ?? [],
    };
  }
}
