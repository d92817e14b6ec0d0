import type { Clock } from '../../utils/time.js';
import { AccessPolicy, EntryPoint } from './accessPolicy.js';
import { DelegationGraph } from './delegationGraph.js';
import {
  EngineEnv,
  GovernanceNotification,
  GovernanceState,
  NotificationInput,
  Proposal,
  VotingParams,
} from './governanceTypes.js';
import { LifecycleController } from './lifecycleController.js';
import {
  CreateProposalInput,
  ProposalDetailsInput,
  ProposalRegistry,
  VotingParamsInput,
} from './proposalRegistry.js';
import { CastVoteResult, VotingEngine } from './votingEngine.js';
import type { WeightSource } from './weightSource.js';

/** Environment whose notifications are stamped and kept in call order. */
export class RecordingEnv implements EngineEnv {
  readonly notifications: GovernanceNotification[] = [];

  constructor(
    readonly clock: Clock,
    readonly weights: WeightSource,
  ) {}

  notify(notification: NotificationInput): void {
    const stamped: GovernanceNotification = { ...notification, timestamp: this.clock.now() };
    this.notifications.push(stamped);
  }

  drain(): GovernanceNotification[] {
    return this.notifications.splice(0, this.notifications.length);
  }
}

/**
 * All engine components bound to one state object. Every mutating entry
 * point checks its caller's role first, then validates, then mutates.
 */
export class GovernanceEngine {
  readonly access: AccessPolicy;
  readonly registry: ProposalRegistry;
  readonly delegation: DelegationGraph;
  readonly voting: VotingEngine;
  readonly lifecycle: LifecycleController;

  constructor(state: GovernanceState, env: EngineEnv) {
    this.access = new AccessPolicy(state, env);
    this.registry = new ProposalRegistry(state, env);
    this.delegation = new DelegationGraph(state, env, this.registry);
    this.voting = new VotingEngine(state, env, this.registry, this.delegation);
    this.lifecycle = new LifecycleController(state, env, this.registry);
  }

  private guard(caller: string, entryPoint: EntryPoint): void {
    this.access.guard(caller, entryPoint);
  }

  // ─── Proposal lifecycle (multisig) ────────────────────────────────────

  createProposal(caller: string, input: CreateProposalInput): Proposal {
    this.guard(caller, 'createProposal');
    return this.registry.createProposal(input);
  }

  updateProposalDetails(caller: string, proposalId: number, input: ProposalDetailsInput): Proposal {
    this.guard(caller, 'updateProposalDetails');
    return this.registry.updateProposalDetails(proposalId, input);
  }

  cancelProposal(caller: string, proposalId: number): Proposal {
    this.guard(caller, 'cancelProposal');
    return this.registry.cancelProposal(proposalId);
  }

  extendVoting(caller: string, proposalId: number, additionalTime: number): Proposal {
    this.guard(caller, 'extendVoting');
    return this.registry.extendVoting(proposalId, additionalTime);
  }

  updateVotingParams(caller: string, input: VotingParamsInput): VotingParams {
    this.guard(caller, 'updateVotingParams');
    return this.registry.updateVotingParams(input);
  }

  executeProposal(caller: string, proposalId: number): Proposal {
    this.guard(caller, 'executeProposal');
    return this.lifecycle.executeProposal(proposalId);
  }

  // ─── Administration (owner) ───────────────────────────────────────────

  removeCancelledProposalData(caller: string, voter: string, proposalId: number): void {
    this.guard(caller, 'removeCancelledProposalData');
    this.registry.removeCancelledProposalData(voter, proposalId);
  }

  setMaxDelegators(caller: string, limit: number): void {
    this.guard(caller, 'setMaxDelegators');
    this.delegation.setMaxDelegators(limit);
  }

  changeMultisig(caller: string, newMultisig: string): void {
    this.guard(caller, 'changeMultisig');
    this.access.changeMultisig(newMultisig);
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.guard(caller, 'transferOwnership');
    this.access.transferOwnership(newOwner);
  }

  acceptOwnership(caller: string): void {
    this.guard(caller, 'acceptOwnership');
    this.access.acceptOwnership(caller);
  }

  renounceOwnership(caller: string): never {
    this.guard(caller, 'renounceOwnership');
    return this.access.renounceOwnership();
  }

  // ─── Voting & delegation (any account) ────────────────────────────────

  castVote(caller: string, proposalId: number, option: number): CastVoteResult {
    this.guard(caller, 'castVote');
    return this.voting.castVote(caller, proposalId, option);
  }

  delegateGlobally(caller: string, to: string): void {
    this.guard(caller, 'delegateGlobally');
    this.delegation.delegateGlobally(caller, to);
  }

  delegateForProposal(caller: string, proposalId: number, to: string): void {
    this.guard(caller, 'delegateForProposal');
    this.delegation.delegateForProposal(caller, proposalId, to);
  }

  revokeGlobalDelegation(caller: string): void {
    this.guard(caller, 'revokeGlobalDelegation');
    this.delegation.revokeGlobalDelegation(caller);
  }

  revokeProposalDelegation(caller: string, proposalId: number): void {
    this.guard(caller, 'revokeProposalDelegation');
    this.delegation.revokeProposalDelegation(caller, proposalId);
  }
}
