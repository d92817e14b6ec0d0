// ─── Governance API wire types ─────────────────────────────────────────────
// Mirrors the JSON the HTTP API returns. Weights are decimal strings,
// timestamps are unix seconds.
// ────────────────────────────────────────────────────────────────────────────

// ─── Core unions ───────────────────────────────────────────────────────────

export type ProposalType = 'standard' | 'treasury' | 'protocol';
export type ProposalStatus = 'pending' | 'active' | 'succeeded' | 'defeated' | 'tie' | 'cancelled';
export type AccountRole = 'none' | 'owner' | 'multisig';
export type ProposalIndex = 'active' | 'cancelled';

// ─── Proposals ─────────────────────────────────────────────────────────────

export interface ProposalDetails {
  type: ProposalType;
  description: string;
  docRef?: string;
  options: string[];
}

export interface CreateProposalOpts extends ProposalDetails {
  minimumVotes: number;
}

export interface Proposal {
  id: number;
  type: ProposalType;
  status: ProposalStatus;
  description: string;
  docRef: string;
  options: string[];
  createdAt: number;
  voteStart: number;
  voteEnd: number;
  timelockEnd: number;
  minimumVotes: number;
  votingStarted: boolean;
  /** -1 until a single leading option exists. */
  winningOption: number;
  highestWeight: string;
  votesCounted: number;
  extensions: number;
}

export interface ProposalResponse {
  proposal: Proposal;
}

export interface ProposalListResponse {
  status: ProposalIndex;
  proposalIds: number[];
}

export interface OptionTally {
  proposalId: number;
  option: number;
  weight: string;
}

export interface WinningOption {
  option: number;
  label: string;
  weight: string;
}

// ─── Votes ─────────────────────────────────────────────────────────────────

export interface VoteRecord {
  voted: boolean;
  option: number;
  /** Set when the vote was cast on this account's behalf by its delegatee. */
  proxy?: string;
}

export interface CastVoteResponse {
  proposalId: number;
  voter: string;
  option: number;
  weight: string;
  proxies: string[];
}

// ─── Delegation ────────────────────────────────────────────────────────────

export interface DelegationResponse {
  delegator: string;
  delegatee: string;
  proposalId: number | null;
}

export interface DelegatorsResponse {
  delegatee: string;
  proposalId: number;
  delegators: string[];
}

export interface DelegatorCountResponse {
  delegatee: string;
  proposalId: number;
  count: number;
}

// ─── Accounts & settings ───────────────────────────────────────────────────

export interface AccountSummary {
  account: string;
  role: AccountRole;
  weight: string;
  streak: number;
  votedProposalIds: number[];
  hasGlobalDelegation: boolean;
  globalDelegatee: string | null;
}

export interface VotingParams {
  voteDelay: number;
  voteDuration: number;
  timelockDuration: number;
}

export interface GovernanceSettings extends VotingParams {
  maxDelegators: number;
  owner: string;
  pendingOwner: string | null;
  multisig: string;
}

export interface GovernanceStats {
  executed: number;
  succeeded: number;
  defeated: number;
  proposals: number;
  active: number;
  cancelled: number;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  env: string;
  uptimeSeconds: number;
  processPid: number;
  wsClients: number;
  proposals: number;
}

export interface OkResponse {
  ok: true;
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
