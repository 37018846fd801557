import { PublicKey } from '@solana/web3.js';
import type { AuthorityStatus, MintAuthorityState } from './types';

// Fixed byte ranges of the two authority fields in the mint account
const MINT_AUTHORITY_OFFSET = 4;
const FREEZE_AUTHORITY_OFFSET = 36;
const AUTHORITY_LEN = 32;

function decodeAuthority(data: Uint8Array, offset: number): AuthorityStatus {
  if (data.length < offset + AUTHORITY_LEN) return { state: 'undetermined' };

  const authority = new PublicKey(data.subarray(offset, offset + AUTHORITY_LEN));
  // The all-zero default address is the "no authority" sentinel
  if (authority.equals(PublicKey.default)) return { state: 'revoked' };
  return { state: 'active', holder: authority.toBase58() };
}

export function decodeMintAuthorities(data: Uint8Array): MintAuthorityState {
  return {
    mintAuthority: decodeAuthority(data, MINT_AUTHORITY_OFFSET),
    freezeAuthority: decodeAuthority(data, FREEZE_AUTHORITY_OFFSET),
  };
}
