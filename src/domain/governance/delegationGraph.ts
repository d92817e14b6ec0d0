/**
 * Delegation Graph.
 *
 * Two disjoint edge namespaces: global (delegator → delegatee for every
 * proposal) and per-proposal. Each delegator holds at most one edge per
 * namespace. Reverse indices are maintained alongside every edge change.
 * Resolution is single-hop: a delegatee's own delegation is never followed.
 */

import { ErrorCode, badInput, conflict } from '../../errors/taxonomy.js';
import { assertAccount } from './accessPolicy.js';
import { deleteEntry, entryOf, entryOrInit, setEntry } from './accountRecords.js';
import { EngineEnv, GovernanceState, ZERO_ADDRESS } from './governanceTypes.js';
import { ProposalRegistry } from './proposalRegistry.js';

function withoutAccount(accounts: readonly string[], account: string): string[] {
  return accounts.filter((candidate) => candidate !== account);
}

export class DelegationGraph {
  constructor(
    private readonly state: GovernanceState,
    private readonly env: EngineEnv,
    private readonly registry: ProposalRegistry,
  ) {}

  delegateGlobally(delegator: string, to: string): void {
    this.assertDelegatee(delegator, to);
    if (this.hasGlobalDelegation(delegator)) {
      throw conflict(ErrorCode.AlreadyDelegated, 'A global delegation is already active.', { delegator });
    }
    this.assertCapacity(to);

    const { delegation } = this.state;
    setEntry(delegation.global, delegator, to);
    entryOrInit(delegation.globalDelegators, to, () => []).push(delegator);
    setEntry(delegation.delegatorCounts, to, this.totalDelegatorCount(to) + 1);

    this.env.notify({ type: 'delegation.granted', delegator, delegatee: to, proposalId: null });
  }

  delegateForProposal(delegator: string, proposalId: number, to: string): void {
    this.assertDelegatee(delegator, to);
    this.registry.require(proposalId);
    if (this.registry.hasVoted(proposalId, delegator)) {
      throw conflict(ErrorCode.AlreadyVoted, 'Account has already voted on this proposal.', {
        proposalId,
        delegator,
      });
    }
    const key = String(proposalId);
    if (this.proposalDelegateeOf(proposalId, delegator) !== undefined) {
      throw conflict(ErrorCode.AlreadyDelegated, 'A delegation for this proposal is already active.', {
        proposalId,
        delegator,
      });
    }
    this.assertCapacity(to);

    const { delegation } = this.state;
    setEntry(delegation.perProposal[key] ??= {}, delegator, to);
    const byDelegatee = (delegation.proposalDelegators[key] ??= {});
    entryOrInit(byDelegatee, to, () => []).push(delegator);
    setEntry(delegation.delegatorCounts, to, this.totalDelegatorCount(to) + 1);

    this.env.notify({ type: 'delegation.granted', delegator, delegatee: to, proposalId });
  }

  revokeGlobalDelegation(delegator: string): void {
    const { delegation } = this.state;
    const delegatee = entryOf(delegation.global, delegator);
    if (delegatee === undefined) {
      throw conflict(ErrorCode.NoDelegationToRevoke, 'No global delegation to revoke.', { delegator });
    }

    deleteEntry(delegation.global, delegator);
    setEntry(
      delegation.globalDelegators,
      delegatee,
      withoutAccount(entryOf(delegation.globalDelegators, delegatee) ?? [], delegator),
    );
    this.decrementCount(delegatee);

    this.env.notify({ type: 'delegation.revoked', delegator, delegatee, proposalId: null });
  }

  revokeProposalDelegation(delegator: string, proposalId: number): void {
    const { delegation } = this.state;
    const key = String(proposalId);
    const edges = delegation.perProposal[key];
    const delegatee = edges === undefined ? undefined : entryOf(edges, delegator);
    if (edges === undefined || delegatee === undefined) {
      throw conflict(ErrorCode.NoDelegationToRevoke, 'No delegation for this proposal to revoke.', {
        proposalId,
        delegator,
      });
    }

    deleteEntry(edges, delegator);
    const byDelegatee = delegation.proposalDelegators[key] ?? {};
    setEntry(byDelegatee, delegatee, withoutAccount(entryOf(byDelegatee, delegatee) ?? [], delegator));
    delegation.proposalDelegators[key] = byDelegatee;
    this.decrementCount(delegatee);

    this.env.notify({ type: 'delegation.revoked', delegator, delegatee, proposalId });
  }

  setMaxDelegators(limit: number): void {
    if (!Number.isSafeInteger(limit) || limit < 1) {
      throw badInput(ErrorCode.InvalidParameter, 'maxDelegators must be an integer >= 1.', { maxDelegators: limit });
    }
    this.state.params.maxDelegators = limit;
    this.env.notify({ type: 'delegators.limit.updated', maxDelegators: limit });
  }

  // ─── Resolution & queries ─────────────────────────────────────────────

  /** Per-proposal edge first, then global; the null account when neither. */
  effectiveDelegatee(proposalId: number, voter: string): string {
    return this.proposalDelegateeOf(proposalId, voter)
      ?? entryOf(this.state.delegation.global, voter)
      ?? ZERO_ADDRESS;
  }

  isDelegating(proposalId: number, account: string): boolean {
    return this.effectiveDelegatee(proposalId, account) !== ZERO_ADDRESS;
  }

  hasGlobalDelegation(account: string): boolean {
    return entryOf(this.state.delegation.global, account) !== undefined;
  }

  globalDelegateeOf(account: string): string | null {
    return entryOf(this.state.delegation.global, account) ?? null;
  }

  proposalDelegators(proposalId: number, delegatee: string): string[] {
    const byDelegatee = this.state.delegation.proposalDelegators[String(proposalId)];
    return [...(byDelegatee === undefined ? [] : entryOf(byDelegatee, delegatee) ?? [])];
  }

  globalDelegators(delegatee: string): string[] {
    return [...(entryOf(this.state.delegation.globalDelegators, delegatee) ?? [])];
  }

  /** Global delegators plus the delegators scoped to the given proposal. */
  delegatorCount(delegatee: string, proposalId: number): number {
    return this.globalDelegators(delegatee).length + this.proposalDelegators(proposalId, delegatee).length;
  }

  /** Inbound edges across both namespaces and every proposal. */
  totalDelegatorCount(delegatee: string): number {
    return entryOf(this.state.delegation.delegatorCounts, delegatee) ?? 0;
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private proposalDelegateeOf(proposalId: number, delegator: string): string | undefined {
    const edges = this.state.delegation.perProposal[String(proposalId)];
    return edges === undefined ? undefined : entryOf(edges, delegator);
  }

  private assertDelegatee(delegator: string, to: string): void {
    assertAccount(to, 'delegatee');
    if (to === delegator) {
      throw conflict(ErrorCode.CannotDelegateSelf, 'An account cannot delegate to itself.', { delegator });
    }
  }

  private assertCapacity(delegatee: string): void {
    const limit = this.state.params.maxDelegators;
    const current = this.totalDelegatorCount(delegatee);
    if (current >= limit) {
      throw conflict(ErrorCode.MaximumDelegatorsLimitReached, 'Delegatee has reached the maximum number of delegators.', {
        delegatee,
        current,
        limit,
      });
    }
  }

  private decrementCount(delegatee: string): void {
    const next = this.totalDelegatorCount(delegatee) - 1;
    if (next > 0) {
      setEntry(this.state.delegation.delegatorCounts, delegatee, next);
    } else {
      deleteEntry(this.state.delegation.delegatorCounts, delegatee);
    }
  }
}
