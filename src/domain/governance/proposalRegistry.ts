/**
 * Proposal Registry.
 *
 * Owns proposal records, vote records, option tallies and the active /
 * cancelled index sets. Timing is fixed at creation from the voting
 * parameters in force at that moment.
 */

import { DomainError, ErrorCode, badInput, conflict, notFound } from '../../errors/taxonomy.js';
import {
  EngineEnv,
  GovernanceState,
  MAX_EXTENSIONS,
  MAX_OPTIONS,
  MIN_OPTIONS,
  Proposal,
  ProposalType,
  VoteRecord,
  VotingParams,
} from './governanceTypes.js';
import { deleteEntry, entryOf, entryOrInit, setEntry } from './accountRecords.js';
import { ZERO_WEIGHT } from './weights.js';

export interface ProposalDetailsInput {
  type: ProposalType;
  description: string;
  docRef: string;
  options: string[];
}

export interface CreateProposalInput extends ProposalDetailsInput {
  minimumVotes: number;
}

export type VotingParamsInput = Omit<VotingParams, 'maxDelegators'>;

function assertOptionCount(options: readonly string[]): void {
  if (options.length < MIN_OPTIONS) {
    throw badInput(ErrorCode.AtLeastTwoOptionsRequired, `A proposal needs at least ${MIN_OPTIONS} options.`, {
      options: options.length,
    });
  }
  if (options.length > MAX_OPTIONS) {
    throw badInput(ErrorCode.OptionsLimitExceeded, `A proposal takes at most ${MAX_OPTIONS} options.`, {
      options: options.length,
    });
  }
}

function assertWholeNumber(value: number, field: string, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw badInput(ErrorCode.InvalidParameter, `${field} must be an integer >= ${min}.`, { [field]: value });
  }
}

export function removeId(ids: number[], id: number): number[] {
  return ids.filter((candidate) => candidate !== id);
}

export class ProposalRegistry {
  constructor(
    private readonly state: GovernanceState,
    private readonly env: EngineEnv,
  ) {}

  require(proposalId: number): Proposal {
    const proposal = this.state.proposals[String(proposalId)];
    if (!proposal) {
      throw notFound(ErrorCode.ProposalNotExists, `Proposal ${proposalId} does not exist.`, { proposalId });
    }
    return proposal;
  }

  createProposal(input: CreateProposalInput): Proposal {
    assertOptionCount(input.options);
    assertWholeNumber(input.minimumVotes, 'minimumVotes', 0);

    const now = this.env.clock.now();
    const { voteDelay, voteDuration, timelockDuration } = this.state.params;
    const id = this.state.nextProposalId;
    const voteStart = now + voteDelay;
    const voteEnd = voteStart + voteDuration;

    const proposal: Proposal = {
      id,
      type: input.type,
      status: 'pending',
      description: input.description,
      docRef: input.docRef,
      options: [...input.options],
      createdAt: now,
      voteStart,
      voteEnd,
      timelockEnd: voteEnd + timelockDuration,
      minimumVotes: input.minimumVotes,
      votingStarted: false,
      winningOption: -1,
      highestWeight: ZERO_WEIGHT,
      votesCounted: 0,
      extensions: 0,
    };

    this.state.nextProposalId = id + 1;
    this.state.proposals[String(id)] = proposal;
    this.state.votes[String(id)] = {};
    this.state.tallies[String(id)] = proposal.options.map(() => ZERO_WEIGHT);
    this.state.voters[String(id)] = [];

    this.env.notify({ type: 'proposal.created', proposal: structuredClone(proposal) });
    return proposal;
  }

  /** Rewrites type, text and options of a proposal whose vote has not begun. */
  updateProposalDetails(proposalId: number, input: ProposalDetailsInput): Proposal {
    const proposal = this.require(proposalId);
    if (this.env.clock.now() >= proposal.voteStart) {
      throw conflict(ErrorCode.VotingAlreadyStarted, 'Voting has already started.', { proposalId });
    }
    if (proposal.status !== 'pending') {
      throw conflict(ErrorCode.InvalidProposalStatus, `Proposal is ${proposal.status}.`, { proposalId });
    }
    assertOptionCount(input.options);

    proposal.type = input.type;
    proposal.description = input.description;
    proposal.docRef = input.docRef;
    proposal.options = [...input.options];
    // voteStart is still ahead, so nothing has been tallied yet.
    this.state.tallies[String(proposalId)] = proposal.options.map(() => ZERO_WEIGHT);

    this.env.notify({
      type: 'proposal.updated',
      proposalId,
      proposalType: proposal.type,
      description: proposal.description,
      docRef: proposal.docRef,
      options: [...proposal.options],
    });
    return proposal;
  }

  cancelProposal(proposalId: number): Proposal {
    const proposal = this.require(proposalId);
    if (this.env.clock.now() >= proposal.voteEnd) {
      throw conflict(ErrorCode.VotingAlreadyEnded, 'Voting has already ended.', { proposalId });
    }
    if (proposal.status !== 'pending' && proposal.status !== 'active') {
      throw conflict(ErrorCode.InvalidProposalStatus, `Proposal is ${proposal.status}.`, { proposalId });
    }

    proposal.status = 'cancelled';
    this.state.activeProposalIds = removeId(this.state.activeProposalIds, proposalId);
    this.state.cancelledProposalIds.push(proposalId);

    this.env.notify({ type: 'proposal.cancelled', proposalId });
    return proposal;
  }

  /**
   * Erases one voter's record on a cancelled proposal. Usable once per
   * proposal.
   */
  removeCancelledProposalData(voter: string, proposalId: number): void {
    const proposal = this.require(proposalId);
    if (proposal.status !== 'cancelled') {
      throw conflict(ErrorCode.InvalidProposalStatus, 'Only cancelled proposals can be cleaned.', { proposalId });
    }
    if (this.state.cleanedProposalIds.includes(proposalId)) {
      throw conflict(ErrorCode.ProposalDataAlreadyRemoved, 'Proposal data has already been removed.', { proposalId });
    }

    this.state.cleanedProposalIds.push(proposalId);
    const votes = this.state.votes[String(proposalId)];
    if (votes) {
      deleteEntry(votes, voter);
    }
    const voted = entryOf(this.state.votedProposals, voter);
    if (voted) {
      setEntry(this.state.votedProposals, voter, removeId(voted, proposalId));
    }

    this.env.notify({ type: 'proposal.data.removed', proposalId, voter });
  }

  extendVoting(proposalId: number, additionalTime: number): Proposal {
    const proposal = this.require(proposalId);
    assertWholeNumber(additionalTime, 'additionalTime', 1);
    if (proposal.extensions >= MAX_EXTENSIONS) {
      throw conflict(ErrorCode.ExtensionLimitReached, `Voting can be extended at most ${MAX_EXTENSIONS} times.`, {
        proposalId,
      });
    }
    if (this.env.clock.now() >= proposal.voteEnd) {
      throw conflict(ErrorCode.VotingAlreadyEnded, 'Voting has already ended.', { proposalId });
    }
    if (proposal.status !== 'pending' && proposal.status !== 'active') {
      throw conflict(ErrorCode.InvalidProposalStatus, `Proposal is ${proposal.status}.`, { proposalId });
    }

    proposal.voteEnd += additionalTime;
    proposal.timelockEnd += additionalTime;
    proposal.extensions += 1;

    this.env.notify({
      type: 'voting.extended',
      proposalId,
      additionalTime,
      voteEnd: proposal.voteEnd,
      timelockEnd: proposal.timelockEnd,
      extensions: proposal.extensions,
    });
    return proposal;
  }

  /** New defaults apply to proposals created afterwards only. */
  updateVotingParams(input: VotingParamsInput): VotingParams {
    assertWholeNumber(input.voteDelay, 'voteDelay', 0);
    assertWholeNumber(input.voteDuration, 'voteDuration', 1);
    assertWholeNumber(input.timelockDuration, 'timelockDuration', 0);

    this.state.params = { ...this.state.params, ...input };
    this.env.notify({ type: 'voting.params.updated', ...input });
    return { ...this.state.params };
  }

  // ─── Vote records ─────────────────────────────────────────────────────

  voteOf(proposalId: number, account: string): VoteRecord | undefined {
    const votes = this.state.votes[String(proposalId)];
    return votes === undefined ? undefined : entryOf(votes, account);
  }

  hasVoted(proposalId: number, account: string): boolean {
    return this.voteOf(proposalId, account)?.voted === true;
  }

  recordVote(proposalId: number, account: string, option: number, proxy?: string): void {
    const votes = this.state.votes[String(proposalId)] ?? {};
    setEntry(votes, account, proxy === undefined ? { voted: true, option } : { voted: true, option, proxy });
    this.state.votes[String(proposalId)] = votes;

    (this.state.voters[String(proposalId)] ??= []).push(account);
    entryOrInit(this.state.votedProposals, account, () => []).push(proposalId);
  }

  tallyOf(proposalId: number): string[] {
    return this.state.tallies[String(proposalId)] ?? [];
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  getProposal(proposalId: number): Proposal {
    return structuredClone(this.require(proposalId));
  }

  getOptions(proposalId: number): string[] {
    return [...this.require(proposalId).options];
  }

  getOptionTally(proposalId: number, option: number): string {
    const proposal = this.require(proposalId);
    if (!Number.isInteger(option) || option < 0 || option >= proposal.options.length) {
      throw badInput(ErrorCode.InvalidOption, `Option ${option} is out of range.`, { proposalId, option });
    }
    return this.tallyOf(proposalId)[option] ?? ZERO_WEIGHT;
  }

  getVoteChoice(proposalId: number, account: string): VoteRecord {
    this.require(proposalId);
    const vote = this.voteOf(proposalId, account);
    if (!vote || !vote.voted) {
      throw new DomainError(ErrorCode.NotVoted, 404, 'Account has not voted on this proposal.', {
        proposalId,
        account,
      });
    }
    return { ...vote };
  }

  listVoters(proposalId: number): string[] {
    this.require(proposalId);
    return [...(this.state.voters[String(proposalId)] ?? [])];
  }

  listActiveProposalIds(): number[] {
    return [...this.state.activeProposalIds];
  }

  listCancelledProposalIds(): number[] {
    return [...this.state.cancelledProposalIds];
  }

  votedProposalIds(account: string): number[] {
    return [...(entryOf(this.state.votedProposals, account) ?? [])];
  }

  streakOf(account: string): number {
    return entryOf(this.state.streaks, account) ?? 0;
  }

  proposalCount(): number {
    return this.state.nextProposalId - 1;
  }
}
