// ─── GovernanceClient ──────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the governance HTTP API.
// Works in Node.js 20+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  AccountSummary,
  APIErrorEnvelope,
  CastVoteResponse,
  CreateProposalOpts,
  DelegationResponse,
  DelegatorCountResponse,
  DelegatorsResponse,
  GovernanceSettings,
  GovernanceStats,
  HealthResponse,
  OkResponse,
  OptionTally,
  Proposal,
  ProposalDetails,
  ProposalIndex,
  ProposalListResponse,
  ProposalResponse,
  VoteRecord,
  VotingParams,
  WinningOption,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Account the calls are made as; sent in the x-account header. */
  account?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (value: unknown): value is APIErrorEnvelope => {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return typeof error === 'object' && error !== null
    && 'code' in error && typeof error.code === 'string'
    && 'message' in error && typeof error.message === 'string';
};

const id = (proposalId: number): string => encodeURIComponent(String(proposalId));
const acct = (account: string): string => encodeURIComponent(account);

export class GovernanceClient {
  private readonly baseUrl: string;
  private readonly account?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, account?: string);
  constructor(opts: GovernanceClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceClientOptions, account?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.account = account;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.account = baseUrlOrOpts.account;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** Same server and fetch, calling as another account. */
  as(account: string): GovernanceClient {
    return new GovernanceClient({ baseUrl: this.baseUrl, account, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(withBody: boolean): Record<string, string> {
    const h: Record<string, string> = {};
    // Fastify rejects an empty body sent as JSON.
    if (withBody) h['content-type'] = 'application/json';
    if (this.account) h['x-account'] = this.account;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      // A non-JSON error body falls back to the generic message.
      const payload: unknown = await res.json().catch(() => null);
      const envelope = isErrorEnvelope(payload) ? payload : undefined;
      throw new GovernanceAPIError(
        res.status,
        envelope?.error.code ?? `HTTP_${res.status}`,
        envelope?.error.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.error.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  async stats(): Promise<GovernanceStats> {
    return this.get<GovernanceStats>('/stats');
  }

  async settings(): Promise<GovernanceSettings> {
    return this.get<GovernanceSettings>('/params');
  }

  // ─── Proposals ─────────────────────────────────────────────────────────

  /** Create a proposal. Multisig only. */
  async createProposal(opts: CreateProposalOpts): Promise<Proposal> {
    const result = await this.post<ProposalResponse>('/proposals', opts);
    return result.proposal;
  }

  /** Replace a pending proposal's details; tallies reset to zero. Multisig only. */
  async updateProposal(proposalId: number, details: ProposalDetails): Promise<Proposal> {
    const result = await this.request<ProposalResponse>('PATCH', `/proposals/${id(proposalId)}`, details);
    return result.proposal;
  }

  async cancelProposal(proposalId: number): Promise<Proposal> {
    const result = await this.post<ProposalResponse>(`/proposals/${id(proposalId)}/cancel`);
    return result.proposal;
  }

  async extendVoting(proposalId: number, additionalTime: number): Promise<Proposal> {
    const result = await this.post<ProposalResponse>(`/proposals/${id(proposalId)}/extend`, { additionalTime });
    return result.proposal;
  }

  async executeProposal(proposalId: number): Promise<Proposal> {
    const result = await this.post<ProposalResponse>(`/proposals/${id(proposalId)}/execute`);
    return result.proposal;
  }

  async getProposal(proposalId: number): Promise<Proposal> {
    const result = await this.get<ProposalResponse>(`/proposals/${id(proposalId)}`);
    return result.proposal;
  }

  async listProposals(status: ProposalIndex = 'active'): Promise<number[]> {
    const result = await this.get<ProposalListResponse>(`/proposals?status=${status}`);
    return result.proposalIds;
  }

  async getOptions(proposalId: number): Promise<string[]> {
    const result = await this.get<{ options: string[] }>(`/proposals/${id(proposalId)}/options`);
    return result.options;
  }

  async getOptionTally(proposalId: number, option: number): Promise<string> {
    const result = await this.get<OptionTally>(`/proposals/${id(proposalId)}/options/${option}/tally`);
    return result.weight;
  }

  async getWinningOption(proposalId: number): Promise<WinningOption> {
    return this.get<WinningOption>(`/proposals/${id(proposalId)}/winner`);
  }

  // ─── Votes ─────────────────────────────────────────────────────────────

  async castVote(proposalId: number, option: number): Promise<CastVoteResponse> {
    return this.post<CastVoteResponse>(`/proposals/${id(proposalId)}/votes`, { option });
  }

  async getVoters(proposalId: number): Promise<string[]> {
    const result = await this.get<{ voters: string[] }>(`/proposals/${id(proposalId)}/voters`);
    return result.voters;
  }

  async getVote(proposalId: number, account: string): Promise<VoteRecord> {
    const result = await this.get<{ account: string; vote: VoteRecord }>(
      `/proposals/${id(proposalId)}/votes/${acct(account)}`,
    );
    return result.vote;
  }

  async hasVoted(proposalId: number, account: string): Promise<boolean> {
    const result = await this.get<{ account: string; voted: boolean }>(
      `/proposals/${id(proposalId)}/voted/${acct(account)}`,
    );
    return result.voted;
  }

  /** Remove a voter's record from a cancelled proposal. Owner only. */
  async removeVoterData(proposalId: number, voter: string): Promise<OkResponse> {
    return this.request<OkResponse>('DELETE', `/proposals/${id(proposalId)}/voters/${acct(voter)}`);
  }

  // ─── Delegation ────────────────────────────────────────────────────────

  async delegate(to: string): Promise<DelegationResponse> {
    return this.post<DelegationResponse>('/delegation', { to });
  }

  async revokeDelegation(): Promise<OkResponse> {
    return this.request<OkResponse>('DELETE', '/delegation');
  }

  async delegateForProposal(proposalId: number, to: string): Promise<DelegationResponse> {
    return this.post<DelegationResponse>(`/proposals/${id(proposalId)}/delegation`, { to });
  }

  async revokeProposalDelegation(proposalId: number): Promise<OkResponse> {
    return this.request<OkResponse>('DELETE', `/proposals/${id(proposalId)}/delegation`);
  }

  /** Effective delegatee for a voter on a proposal; the zero address when none. */
  async getDelegatee(proposalId: number, account: string): Promise<string> {
    const result = await this.get<{ account: string; delegatee: string }>(
      `/proposals/${id(proposalId)}/delegates/${acct(account)}`,
    );
    return result.delegatee;
  }

  async getDelegators(delegatee: string, proposalId: number): Promise<string[]> {
    const result = await this.get<DelegatorsResponse>(
      `/delegates/${acct(delegatee)}/delegators?proposalId=${proposalId}`,
    );
    return result.delegators;
  }

  async getDelegatorCount(delegatee: string, proposalId: number): Promise<number> {
    const result = await this.get<DelegatorCountResponse>(
      `/delegates/${acct(delegatee)}/count?proposalId=${proposalId}`,
    );
    return result.count;
  }

  // ─── Accounts ──────────────────────────────────────────────────────────

  async getAccount(account: string): Promise<AccountSummary> {
    return this.get<AccountSummary>(`/accounts/${acct(account)}`);
  }

  // ─── Administration ────────────────────────────────────────────────────

  async updateVotingParams(params: VotingParams): Promise<VotingParams> {
    const result = await this.request<{ params: VotingParams }>('PUT', '/admin/voting-params', params);
    return result.params;
  }

  async setMaxDelegators(maxDelegators: number): Promise<number> {
    const result = await this.request<{ maxDelegators: number }>('PUT', '/admin/max-delegators', { maxDelegators });
    return result.maxDelegators;
  }

  async changeMultisig(account: string): Promise<string> {
    const result = await this.request<{ multisig: string }>('PUT', '/admin/multisig', { account });
    return result.multisig;
  }

  async transferOwnership(account: string): Promise<string> {
    const result = await this.post<{ pendingOwner: string }>('/admin/ownership/transfer', { account });
    return result.pendingOwner;
  }

  async acceptOwnership(): Promise<string> {
    const result = await this.post<{ owner: string }>('/admin/ownership/accept');
    return result.owner;
  }
}
