export interface ResolvedLaunch {
  signature: string;
  creator: string; // fee payer of the create tx
  mint: string;
}

export type ResolveResult =
  | { ok: true; launch: ResolvedLaunch }
  | { ok: false; reason: 'not-found' | 'mint-not-identified' };

export type AuthorityStatus =
  | { state: 'revoked' }
  | { state: 'active'; holder: string }
  | { state: 'undetermined' }; // account data too short to contain the field

export interface MintAuthorityState {
  mintAuthority: AuthorityStatus;
  freezeAuthority: AuthorityStatus;
}

export interface RiskVerdict {
  signature: string;
  mint: string;
  creator: string;
  goodSigns: string[];
  redFlags: string[];
  highRisk: boolean; // true iff redFlags is non-empty
}
