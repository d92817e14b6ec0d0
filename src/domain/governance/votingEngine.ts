/**
 * Voting Engine.
 *
 * Casting a vote pools the caller's weight with every per-proposal delegator
 * of the caller that has not voted yet. Global delegators are not swept in
 * here; only the per-proposal reverse index is walked.
 */

import { ErrorCode, badInput, conflict } from '../../errors/taxonomy.js';
import { setEntry } from './accountRecords.js';
import { DelegationGraph } from './delegationGraph.js';
import { EngineEnv, GovernanceState } from './governanceTypes.js';
import { ProposalRegistry } from './proposalRegistry.js';
import { addWeight, compareWeights } from './weights.js';

export interface CastVoteResult {
  proposalId: number;
  voter: string;
  option: number;
  /** Caller's own weight plus every resolved delegator's. */
  weight: bigint;
  proxies: string[];
}

export class VotingEngine {
  constructor(
    private readonly state: GovernanceState,
    private readonly env: EngineEnv,
    private readonly registry: ProposalRegistry,
    private readonly delegation: DelegationGraph,
  ) {}

  castVote(voter: string, proposalId: number, option: number): CastVoteResult {
    const proposal = this.registry.require(proposalId);
    if (proposal.status === 'cancelled' || proposal.status === 'defeated') {
      throw conflict(ErrorCode.InvalidProposalStatus, `Proposal is ${proposal.status}.`, { proposalId });
    }
    const now = this.env.clock.now();
    if (now < proposal.voteStart || now >= proposal.voteEnd) {
      throw conflict(ErrorCode.VotingNotActive, 'Proposal is not open for voting.', {
        proposalId,
        now,
        voteStart: proposal.voteStart,
        voteEnd: proposal.voteEnd,
      });
    }
    if (!Number.isInteger(option) || option < 0 || option >= proposal.options.length) {
      throw badInput(ErrorCode.InvalidOption, `Option ${option} is out of range.`, { proposalId, option });
    }
    if (this.registry.hasVoted(proposalId, voter)) {
      throw conflict(ErrorCode.AlreadyVoted, 'Account has already voted on this proposal.', { proposalId, voter });
    }
    if (this.delegation.isDelegating(proposalId, voter)) {
      throw conflict(ErrorCode.DelegatorCannotVote, 'An account with an active delegation cannot vote.', {
        proposalId,
        voter,
      });
    }

    if (!proposal.votingStarted) {
      proposal.votingStarted = true;
      proposal.status = 'active';
      this.state.activeProposalIds.push(proposalId);
    }

    const ownWeight = this.env.weights.weightOf(voter);
    this.registry.recordVote(proposalId, voter, option);

    if (ownWeight > 0n) {
      proposal.votesCounted += 1;
      if (this.registry.hasVoted(proposalId - 1, voter)) {
        setEntry(this.state.streaks, voter, this.registry.streakOf(voter) + 1);
      }
    }

    let total = ownWeight;
    const proxies: string[] = [];
    for (const delegator of this.delegation.proposalDelegators(proposalId, voter)) {
      if (this.registry.hasVoted(proposalId, delegator)) continue;

      const delegatedWeight = this.env.weights.weightOf(delegator);
      if (delegatedWeight === 0n) continue;

      this.registry.recordVote(proposalId, delegator, option, voter);
      proxies.push(delegator);
      total += delegatedWeight;
    }

    const tally = this.registry.tallyOf(proposalId);
    tally[option] = addWeight(tally[option] ?? '0', total, `tally[${option}]`);

    // Ties are left for execution to detect.
    if (compareWeights(tally[option], proposal.highestWeight) > 0) {
      proposal.highestWeight = tally[option];
      proposal.winningOption = option;
    }

    this.env.notify({ type: 'vote.cast', proposalId, voter, option, weight: total.toString() });
    return { proposalId, voter, option, weight: total, proxies };
  }
}
