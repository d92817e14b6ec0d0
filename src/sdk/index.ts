// Governance API SDK entry point
export { GovernanceClient, GovernanceAPIError } from './client.js';
export type { GovernanceClientOptions } from './client.js';
export type {
  // Core unions
  ProposalType,
  ProposalStatus,
  AccountRole,
  ProposalIndex,

  // Proposals
  ProposalDetails,
  CreateProposalOpts,
  Proposal,
  ProposalResponse,
  ProposalListResponse,
  OptionTally,
  WinningOption,

  // Votes
  VoteRecord,
  CastVoteResponse,

  // Delegation
  DelegationResponse,
  DelegatorsResponse,
  DelegatorCountResponse,

  // Accounts & settings
  AccountSummary,
  VotingParams,
  GovernanceSettings,
  GovernanceStats,

  // System
  HealthResponse,
  OkResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
