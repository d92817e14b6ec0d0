/**
 * Governance service.
 *
 * Runs each engine call as one store transaction. Notifications collected
 * during the call are journaled and published on the event bus only after
 * the transaction commits; a rejected call publishes nothing. Each published
 * notification gets an `eventId` shared by its log line and its bus payload.
 */

import { v4 as uuid } from 'uuid';
import { EntryPoint } from '../domain/governance/accessPolicy.js';
import { GovernanceEngine, RecordingEnv } from '../domain/governance/governanceEngine.js';
import {
  AccessState,
  GovernanceCounters,
  GovernanceNotification,
  Proposal,
  VoteRecord,
  VotingParams,
} from '../domain/governance/governanceTypes.js';
import { WinningOption } from '../domain/governance/lifecycleController.js';
import {
  CreateProposalInput,
  ProposalDetailsInput,
  VotingParamsInput,
} from '../domain/governance/proposalRegistry.js';
import { WeightSource } from '../domain/governance/weightSource.js';
import { DomainError } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { Clock } from '../utils/time.js';

export type ProposalIndex = 'active' | 'cancelled';

export interface CastVoteOutcome {
  proposalId: number;
  voter: string;
  option: number;
  weight: string;
  proxies: string[];
}

export interface AccountSummary {
  account: string;
  role: 'none' | 'owner' | 'multisig';
  weight: string;
  streak: number;
  votedProposalIds: number[];
  hasGlobalDelegation: boolean;
  globalDelegatee: string | null;
}

export interface GovernanceStats extends GovernanceCounters {
  proposals: number;
  active: number;
  cancelled: number;
}

export interface GovernanceSettings extends VotingParams, AccessState {}

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: Clock,
    private readonly weights: WeightSource,
  ) {}

  // ─── Proposal lifecycle ───────────────────────────────────────────────

  createProposal(caller: string, input: CreateProposalInput): Promise<Proposal> {
    return this.mutate(caller, 'createProposal', (engine) => structuredClone(engine.createProposal(caller, input)));
  }

  updateProposalDetails(caller: string, proposalId: number, input: ProposalDetailsInput): Promise<Proposal> {
    return this.mutate(caller, 'updateProposalDetails', (engine) => (
      structuredClone(engine.updateProposalDetails(caller, proposalId, input))
    ));
  }

  cancelProposal(caller: string, proposalId: number): Promise<Proposal> {
    return this.mutate(caller, 'cancelProposal', (engine) => structuredClone(engine.cancelProposal(caller, proposalId)));
  }

  extendVoting(caller: string, proposalId: number, additionalTime: number): Promise<Proposal> {
    return this.mutate(caller, 'extendVoting', (engine) => (
      structuredClone(engine.extendVoting(caller, proposalId, additionalTime))
    ));
  }

  executeProposal(caller: string, proposalId: number): Promise<Proposal> {
    return this.mutate(caller, 'executeProposal', (engine) => structuredClone(engine.executeProposal(caller, proposalId)));
  }

  updateVotingParams(caller: string, input: VotingParamsInput): Promise<VotingParams> {
    return this.mutate(caller, 'updateVotingParams', (engine) => engine.updateVotingParams(caller, input));
  }

  removeCancelledProposalData(caller: string, voter: string, proposalId: number): Promise<void> {
    return this.mutate(caller, 'removeCancelledProposalData', (engine) => (
      engine.removeCancelledProposalData(caller, voter, proposalId)
    ));
  }

  // ─── Voting & delegation ──────────────────────────────────────────────

  castVote(caller: string, proposalId: number, option: number): Promise<CastVoteOutcome> {
    return this.mutate(caller, 'castVote', (engine) => {
      const result = engine.castVote(caller, proposalId, option);
      return { ...result, weight: result.weight.toString() };
    });
  }

  delegateGlobally(caller: string, to: string): Promise<void> {
    return this.mutate(caller, 'delegateGlobally', (engine) => engine.delegateGlobally(caller, to));
  }

  delegateForProposal(caller: string, proposalId: number, to: string): Promise<void> {
    return this.mutate(caller, 'delegateForProposal', (engine) => engine.delegateForProposal(caller, proposalId, to));
  }

  revokeGlobalDelegation(caller: string): Promise<void> {
    return this.mutate(caller, 'revokeGlobalDelegation', (engine) => engine.revokeGlobalDelegation(caller));
  }

  revokeProposalDelegation(caller: string, proposalId: number): Promise<void> {
    return this.mutate(caller, 'revokeProposalDelegation', (engine) => (
      engine.revokeProposalDelegation(caller, proposalId)
    ));
  }

  // ─── Administration ───────────────────────────────────────────────────

  setMaxDelegators(caller: string, limit: number): Promise<void> {
    return this.mutate(caller, 'setMaxDelegators', (engine) => engine.setMaxDelegators(caller, limit));
  }

  changeMultisig(caller: string, newMultisig: string): Promise<void> {
    return this.mutate(caller, 'changeMultisig', (engine) => engine.changeMultisig(caller, newMultisig));
  }

  transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.mutate(caller, 'transferOwnership', (engine) => engine.transferOwnership(caller, newOwner));
  }

  acceptOwnership(caller: string): Promise<void> {
    return this.mutate(caller, 'acceptOwnership', (engine) => engine.acceptOwnership(caller));
  }

  renounceOwnership(caller: string): Promise<never> {
    return this.mutate(caller, 'renounceOwnership', (engine) => engine.renounceOwnership(caller));
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  getProposal(proposalId: number): Proposal {
    return this.view((engine) => engine.registry.getProposal(proposalId));
  }

  getOptions(proposalId: number): string[] {
    return this.view((engine) => engine.registry.getOptions(proposalId));
  }

  getOptionTally(proposalId: number, option: number): string {
    return this.view((engine) => engine.registry.getOptionTally(proposalId, option));
  }

  getVoteChoice(proposalId: number, account: string): VoteRecord {
    return this.view((engine) => engine.registry.getVoteChoice(proposalId, account));
  }

  hasVoted(proposalId: number, account: string): boolean {
    return this.view((engine) => engine.registry.hasVoted(proposalId, account));
  }

  listVoters(proposalId: number): string[] {
    return this.view((engine) => engine.registry.listVoters(proposalId));
  }

  listProposalIds(index: ProposalIndex): number[] {
    return this.view((engine) => (
      index === 'active' ? engine.registry.listActiveProposalIds() : engine.registry.listCancelledProposalIds()
    ));
  }

  getWinningOption(proposalId: number): WinningOption {
    return this.view((engine) => engine.lifecycle.getWinningOption(proposalId));
  }

  effectiveDelegatee(proposalId: number, voter: string): string {
    return this.view((engine) => engine.delegation.effectiveDelegatee(proposalId, voter));
  }

  delegatorCount(delegatee: string, proposalId: number): number {
    return this.view((engine) => engine.delegation.delegatorCount(delegatee, proposalId));
  }

  proposalDelegators(proposalId: number, delegatee: string): string[] {
    return this.view((engine) => engine.delegation.proposalDelegators(proposalId, delegatee));
  }

  hasGlobalDelegation(account: string): boolean {
    return this.view((engine) => engine.delegation.hasGlobalDelegation(account));
  }

  votedProposalIds(account: string): number[] {
    return this.view((engine) => engine.registry.votedProposalIds(account));
  }

  streakOf(account: string): number {
    return this.view((engine) => engine.registry.streakOf(account));
  }

  /** Raw weight, straight from the weight source. */
  weightOf(account: string): string {
    return this.weights.weightOf(account).toString();
  }

  executedCount(): number {
    return this.store.read((state) => state.counters.executed);
  }

  getAccount(account: string): AccountSummary {
    return this.view((engine) => ({
      account,
      role: engine.access.roleOf(account),
      weight: this.weightOf(account),
      streak: engine.registry.streakOf(account),
      votedProposalIds: engine.registry.votedProposalIds(account),
      hasGlobalDelegation: engine.delegation.hasGlobalDelegation(account),
      globalDelegatee: engine.delegation.globalDelegateeOf(account),
    }));
  }

  getStats(): GovernanceStats {
    return this.store.read((state) => ({
      ...state.counters,
      proposals: state.nextProposalId - 1,
      active: state.activeProposalIds.length,
      cancelled: state.cancelledProposalIds.length,
    }));
  }

  getSettings(): GovernanceSettings {
    return this.store.read((state) => ({ ...state.params, ...state.access }));
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private view<T>(query: (engine: GovernanceEngine) => T): T {
    return this.store.read((state) => query(new GovernanceEngine(state, new RecordingEnv(this.clock, this.weights))));
  }

  private async mutate<T>(
    caller: string,
    operation: EntryPoint,
    work: (engine: GovernanceEngine) => T,
  ): Promise<T> {
    const env = new RecordingEnv(this.clock, this.weights);

    let result: T;
    try {
      result = await this.store.transaction((draft) => work(new GovernanceEngine(draft, env)));
    } catch (error) {
      if (error instanceof DomainError) {
        await this.logger.log('warn', 'governance.rejected', {
          operation,
          caller,
          code: error.code,
          message: error.message,
        });
      }
      throw error;
    }

    await this.publish(env.drain());
    return result;
  }

  private async publish(notifications: GovernanceNotification[]): Promise<void> {
    for (const notification of notifications) {
      const eventId = uuid();
      await this.logger.log('info', notification.type, { eventId, notification });
      const failures = eventBus.emit(notification.type, { eventId, ...notification });
      for (const failure of failures) {
        await this.logger.log('error', 'eventBus.listener.failed', {
          eventId,
          eventType: notification.type,
          error: String(failure),
        });
      }
    }
  }
}
