import { ConfigError } from './errors.js';

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

export interface SigningKey {
  algorithm: HmacAlgorithm;
  secret: Uint8Array;
}

/** One symmetric key shared by issuer and verifier; the algorithm is fixed for the process. */
export function createSigningKey(secret: string, algorithm: HmacAlgorithm = 'HS256'): SigningKey {
  if (!secret) {
    throw new ConfigError('signing secret must not be empty');
  }
  return { algorithm, secret: new TextEncoder().encode(secret) };
}
