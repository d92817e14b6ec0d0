/**
 * Governance engine types.
 *
 * Proposals carry 2..4 labelled options. Accounts vote with the weight an
 * external source attributes to them, optionally pooling weight through
 * global or per-proposal delegation. Outcomes are finalized by execution
 * once the timelock has elapsed.
 */

import type { Clock } from '../../utils/time.js';
import type { WeightSource } from './weightSource.js';

export const MIN_OPTIONS = 2;
export const MAX_OPTIONS = 4;
export const MAX_EXTENSIONS = 3;

/** The null account. Never a valid delegatee, owner or controller. */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

export const PROPOSAL_TYPES = ['standard', 'treasury', 'protocol'] as const;

export type ProposalType = (typeof PROPOSAL_TYPES)[number];

export const PROPOSAL_STATUSES = [
  'pending',
  'active',
  'succeeded',
  'defeated',
  'tie',
  'cancelled',
] as const;

export type ProposalStatus = (typeof PROPOSAL_STATUSES)[number];

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
  /** -1 until a single leader is recorded. */
  winningOption: number;
  highestWeight: string; // bigint as string
  votesCounted: number;
  extensions: number;
}

export interface VoteRecord {
  voted: boolean;
  option: number;
  /** Set when the weight was pooled into another account's vote. */
  proxy?: string;
}

export interface VotingParams {
  voteDelay: number;
  voteDuration: number;
  timelockDuration: number;
  maxDelegators: number;
}

export interface AccessState {
  owner: string;
  pendingOwner: string | null;
  multisig: string;
}

export interface DelegationState {
  /** delegator → delegatee, applies to every proposal. */
  global: Record<string, string>;
  /** proposalId → delegator → delegatee. */
  perProposal: Record<string, Record<string, string>>;
  /** delegatee → global delegators. */
  globalDelegators: Record<string, string[]>;
  /** proposalId → delegatee → per-proposal delegators. */
  proposalDelegators: Record<string, Record<string, string[]>>;
  /** delegatee → inbound edges across both namespaces. */
  delegatorCounts: Record<string, number>;
}

export interface GovernanceCounters {
  executed: number;
  succeeded: number;
  defeated: number;
}

export interface GovernanceState {
  access: AccessState;
  params: VotingParams;
  nextProposalId: number;
  proposals: Record<string, Proposal>;
  /** proposalId → account → vote. */
  votes: Record<string, Record<string, VoteRecord>>;
  /** proposalId → per-option weight. */
  tallies: Record<string, string[]>;
  /** proposalId → accounts credited as voters, in crediting order. */
  voters: Record<string, string[]>;
  /** account → proposal ids voted on. */
  votedProposals: Record<string, number[]>;
  streaks: Record<string, number>;
  activeProposalIds: number[];
  cancelledProposalIds: number[];
  /** Cancelled proposals whose one-shot voter cleanup has been used. */
  cleanedProposalIds: number[];
  delegation: DelegationState;
  counters: GovernanceCounters;
}

// ─── Notifications ──────────────────────────────────────────────────────

interface NotificationBase {
  timestamp: number;
}

export interface ProposalCreatedNotification extends NotificationBase {
  type: 'proposal.created';
  proposal: Proposal;
}

export interface ProposalUpdatedNotification extends NotificationBase {
  type: 'proposal.updated';
  proposalId: number;
  proposalType: ProposalType;
  description: string;
  docRef: string;
  options: string[];
}

export interface ProposalCancelledNotification extends NotificationBase {
  type: 'proposal.cancelled';
  proposalId: number;
}

export interface ProposalExecutedNotification extends NotificationBase {
  type: 'proposal.executed';
  proposalId: number;
  status: ProposalStatus;
  winningOption: number;
  highestWeight: string;
}

export interface VoteCastNotification extends NotificationBase {
  type: 'vote.cast';
  proposalId: number;
  voter: string;
  option: number;
  weight: string;
}

export interface DelegationGrantedNotification extends NotificationBase {
  type: 'delegation.granted';
  delegator: string;
  delegatee: string;
  /** null for a global delegation. */
  proposalId: number | null;
}

export interface DelegationRevokedNotification extends NotificationBase {
  type: 'delegation.revoked';
  delegator: string;
  delegatee: string;
  proposalId: number | null;
}

export interface VotingParamsUpdatedNotification extends NotificationBase {
  type: 'voting.params.updated';
  voteDelay: number;
  voteDuration: number;
  timelockDuration: number;
}

export interface VotingExtendedNotification extends NotificationBase {
  type: 'voting.extended';
  proposalId: number;
  additionalTime: number;
  voteEnd: number;
  timelockEnd: number;
  extensions: number;
}

export interface MultisigTransferredNotification extends NotificationBase {
  type: 'multisig.transferred';
  previousMultisig: string;
  newMultisig: string;
}

export interface ProposalDataRemovedNotification extends NotificationBase {
  type: 'proposal.data.removed';
  proposalId: number;
  voter: string;
}

export interface OwnershipTransferStartedNotification extends NotificationBase {
  type: 'ownership.transfer.started';
  owner: string;
  pendingOwner: string;
}

export interface OwnershipTransferredNotification extends NotificationBase {
  type: 'ownership.transferred';
  previousOwner: string;
  newOwner: string;
}

export interface DelegatorsLimitUpdatedNotification extends NotificationBase {
  type: 'delegators.limit.updated';
  maxDelegators: number;
}

export type GovernanceNotification =
  | ProposalCreatedNotification
  | ProposalUpdatedNotification
  | ProposalCancelledNotification
  | ProposalExecutedNotification
  | VoteCastNotification
  | DelegationGrantedNotification
  | DelegationRevokedNotification
  | VotingParamsUpdatedNotification
  | VotingExtendedNotification
  | MultisigTransferredNotification
  | ProposalDataRemovedNotification
  | OwnershipTransferStartedNotification
  | OwnershipTransferredNotification
  | DelegatorsLimitUpdatedNotification;

export type GovernanceNotificationType = GovernanceNotification['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A notification before the engine stamps it with the current time. */
export type NotificationInput = DistributiveOmit<GovernanceNotification, 'timestamp'>;

/** What every engine component sees of the outside world during one call. */
export interface EngineEnv {
  clock: Clock;
  weights: WeightSource;
  notify(notification: NotificationInput): void;
}
