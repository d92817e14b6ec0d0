import fs from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContext, buildApp } from '../src/app.js';
import { InMemoryWeightSource } from '../src/domain/governance/weightSource.js';
import { eventBus } from '../src/infra/eventBus.js';
import { ManualClock } from '../src/utils/time.js';
import { buildTestConfig, makeTempDir, MULTISIG, OWNER, START } from './helpers.js';

let ctx: AppContext;
let dir: string;
let clock: ManualClock;

const proposalBody = {
  type: 'treasury',
  description: 'Fund the security audit',
  docRef: 'docs/audit.md',
  options: ['Approve', 'Reject'],
  minimumVotes: 1,
};

const asAccount = (account: string) => ({ 'x-account': account });

beforeEach(async () => {
  dir = await makeTempDir('governance-api-');
  clock = new ManualClock(START);
  ctx = await buildApp(buildTestConfig(dir), {
    clock,
    weightSource: new InMemoryWeightSource({ alice: 5n, bob: 3n, yara: 2n }),
  });
});

afterEach(async () => {
  eventBus.clear();
  await ctx.app.close();
  await ctx.stateStore.flush();
  await ctx.logger.flush();
  await fs.rm(dir, { recursive: true, force: true });
});

const createProposal = async (): Promise<void> => {
  const res = await ctx.app.inject({ method: 'POST', url: '/proposals', headers: asAccount(MULTISIG), payload: proposalBody });
  expect(res.statusCode).toBe(201);
};

describe('HTTP API', () => {
  it('reports health and parameters', async () => {
    const health = await ctx.app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ status: 'ok', env: 'test', proposals: 0, wsClients: 0 });

    const params = await ctx.app.inject({ method: 'GET', url: '/params' });
    expect(params.json()).toEqual({
      voteDelay: 10,
      voteDuration: 100,
      timelockDuration: 50,
      maxDelegators: 3,
      owner: OWNER,
      pendingOwner: null,
      multisig: MULTISIG,
    });
  });

  describe('POST /proposals', () => {
    it('creates a proposal for the multisig controller', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/proposals', headers: asAccount(MULTISIG), payload: proposalBody });

      expect(res.statusCode).toBe(201);
      expect(res.json().proposal).toMatchObject({
        id: 1,
        type: 'treasury',
        status: 'pending',
        voteStart: START + 10,
        voteEnd: START + 110,
        timelockEnd: START + 160,
        highestWeight: '0',
      });
    });

    it('needs a caller', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/proposals', payload: proposalBody });

      expect(res.statusCode).toBe(401);
      expect(res.json().error.code).toBe('missing_caller');
    });

    it('answers 403 for anyone but the multisig controller', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/proposals', headers: asAccount('alice'), payload: proposalBody });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        error: { code: 'only_multisig', message: 'createProposal is restricted to the multisig controller.' },
      });
    });

    it('validates the payload', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/proposals',
        headers: asAccount(MULTISIG),
        payload: { ...proposalBody, type: 'ballot' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('invalid_payload');
    });

    it('maps option-count failures to their own codes', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/proposals',
        headers: asAccount(MULTISIG),
        payload: { ...proposalBody, options: ['Only'] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('at_least_two_options_required');
    });
  });

  it('answers 404 for an unknown proposal', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/proposals/9' });

    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe('proposal_not_exists');
  });

  it('runs a vote from creation to the winner', async () => {
    await createProposal();
    const delegated = await ctx.app.inject({
      method: 'POST',
      url: '/proposals/1/delegation',
      headers: asAccount('yara'),
      payload: { to: 'alice' },
    });
    expect(delegated.statusCode).toBe(201);
    expect(delegated.json()).toEqual({ delegator: 'yara', delegatee: 'alice', proposalId: 1 });

    clock.set(START + 10);
    const vote = await ctx.app.inject({
      method: 'POST',
      url: '/proposals/1/votes',
      headers: asAccount('alice'),
      payload: { option: 0 },
    });
    expect(vote.statusCode).toBe(201);
    expect(vote.json()).toEqual({ proposalId: 1, voter: 'alice', option: 0, weight: '7', proxies: ['yara'] });

    const again = await ctx.app.inject({
      method: 'POST',
      url: '/proposals/1/votes',
      headers: asAccount('alice'),
      payload: { option: 1 },
    });
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('already_voted');

    const tally = await ctx.app.inject({ method: 'GET', url: '/proposals/1/options/0/tally' });
    expect(tally.json()).toEqual({ proposalId: 1, option: 0, weight: '7' });

    const voters = await ctx.app.inject({ method: 'GET', url: '/proposals/1/voters' });
    expect(voters.json()).toEqual({ voters: ['alice', 'yara'] });

    const choice = await ctx.app.inject({ method: 'GET', url: '/proposals/1/votes/yara' });
    expect(choice.json()).toEqual({ account: 'yara', vote: { voted: true, option: 0, proxy: 'alice' } });

    const active = await ctx.app.inject({ method: 'GET', url: '/proposals?status=active' });
    expect(active.json()).toEqual({ status: 'active', proposalIds: [1] });

    clock.set(START + 159);
    const early = await ctx.app.inject({ method: 'POST', url: '/proposals/1/execute', headers: asAccount(MULTISIG) });
    expect(early.statusCode).toBe(409);
    expect(early.json().error.code).toBe('timelock_not_over');

    clock.set(START + 160);
    const executed = await ctx.app.inject({ method: 'POST', url: '/proposals/1/execute', headers: asAccount(MULTISIG) });
    expect(executed.statusCode).toBe(200);
    expect(executed.json().proposal).toMatchObject({ status: 'succeeded', winningOption: 0, highestWeight: '7' });

    clock.set(START + 161);
    const winner = await ctx.app.inject({ method: 'GET', url: '/proposals/1/winner' });
    expect(winner.json()).toEqual({ option: 0, label: 'Approve', weight: '7' });

    const stats = await ctx.app.inject({ method: 'GET', url: '/stats' });
    expect(stats.json()).toEqual({ executed: 1, succeeded: 1, defeated: 0, proposals: 1, active: 0, cancelled: 0 });
  });

  it('reports a missing vote as 404', async () => {
    await createProposal();

    const res = await ctx.app.inject({ method: 'GET', url: '/proposals/1/votes/bob' });
    const voted = await ctx.app.inject({ method: 'GET', url: '/proposals/1/voted/bob' });

    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe('not_voted');
    expect(voted.json()).toEqual({ account: 'bob', voted: false });
  });

  it('manages global delegation', async () => {
    await createProposal();

    const granted = await ctx.app.inject({ method: 'POST', url: '/delegation', headers: asAccount('yara'), payload: { to: 'bob' } });
    expect(granted.statusCode).toBe(201);

    const self = await ctx.app.inject({ method: 'POST', url: '/delegation', headers: asAccount('bob'), payload: { to: 'bob' } });
    expect(self.statusCode).toBe(409);
    expect(self.json().error.code).toBe('cannot_delegate_self');

    const delegatee = await ctx.app.inject({ method: 'GET', url: '/proposals/1/delegates/yara' });
    expect(delegatee.json()).toEqual({ account: 'yara', delegatee: 'bob' });

    const count = await ctx.app.inject({ method: 'GET', url: '/delegates/bob/count?proposalId=1' });
    expect(count.json()).toEqual({ delegatee: 'bob', proposalId: 1, count: 1 });

    const account = await ctx.app.inject({ method: 'GET', url: '/accounts/yara' });
    expect(account.json()).toMatchObject({ weight: '2', hasGlobalDelegation: true, globalDelegatee: 'bob' });

    const revoked = await ctx.app.inject({ method: 'DELETE', url: '/delegation', headers: asAccount('yara') });
    expect(revoked.statusCode).toBe(200);
    expect(revoked.json()).toEqual({ ok: true });

    const twice = await ctx.app.inject({ method: 'DELETE', url: '/delegation', headers: asAccount('yara') });
    expect(twice.statusCode).toBe(409);
    expect(twice.json().error.code).toBe('no_delegation_to_revoke');
  });

  it('serves accounts named after Object.prototype members', async () => {
    await createProposal();

    const granted = await ctx.app.inject({ method: 'POST', url: '/delegation', headers: asAccount('yara'), payload: { to: 'toString' } });
    expect(granted.statusCode).toBe(201);
    expect(granted.json()).toEqual({ delegator: 'yara', delegatee: 'toString', proposalId: null });

    clock.set(START + 10);
    const vote = await ctx.app.inject({ method: 'POST', url: '/proposals/1/votes', headers: asAccount('constructor'), payload: { option: 0 } });
    expect(vote.statusCode).toBe(201);

    const choice = await ctx.app.inject({ method: 'GET', url: '/proposals/1/votes/constructor' });
    expect(choice.json()).toEqual({ account: 'constructor', vote: { voted: true, option: 0 } });

    const account = await ctx.app.inject({ method: 'GET', url: '/accounts/hasOwnProperty' });
    expect(account.json()).toMatchObject({ hasGlobalDelegation: false, globalDelegatee: null, votedProposalIds: [] });
  });

  it('lists per-proposal delegators', async () => {
    await createProposal();
    await ctx.app.inject({ method: 'POST', url: '/proposals/1/delegation', headers: asAccount('yara'), payload: { to: 'bob' } });

    const res = await ctx.app.inject({ method: 'GET', url: '/delegates/bob/delegators?proposalId=1' });
    expect(res.json()).toEqual({ delegatee: 'bob', proposalId: 1, delegators: ['yara'] });

    const revoked = await ctx.app.inject({ method: 'DELETE', url: '/proposals/1/delegation', headers: asAccount('yara') });
    expect(revoked.statusCode).toBe(200);

    const after = await ctx.app.inject({ method: 'GET', url: '/delegates/bob/delegators?proposalId=1' });
    expect(after.json().delegators).toEqual([]);
  });

  it('updates, extends and cancels a proposal', async () => {
    await createProposal();

    const updated = await ctx.app.inject({
      method: 'PATCH',
      url: '/proposals/1',
      headers: asAccount(MULTISIG),
      payload: { type: 'protocol', description: 'Upgrade the router', options: ['Yes', 'No', 'Later'] },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json().proposal).toMatchObject({ type: 'protocol', docRef: '', options: ['Yes', 'No', 'Later'] });

    const extended = await ctx.app.inject({
      method: 'POST',
      url: '/proposals/1/extend',
      headers: asAccount(MULTISIG),
      payload: { additionalTime: 30 },
    });
    expect(extended.json().proposal).toMatchObject({ voteEnd: START + 140, timelockEnd: START + 190, extensions: 1 });

    const cancelled = await ctx.app.inject({ method: 'POST', url: '/proposals/1/cancel', headers: asAccount(MULTISIG) });
    expect(cancelled.json().proposal.status).toBe('cancelled');

    const list = await ctx.app.inject({ method: 'GET', url: '/proposals?status=cancelled' });
    expect(list.json()).toEqual({ status: 'cancelled', proposalIds: [1] });

    const options = await ctx.app.inject({ method: 'GET', url: '/proposals/1/options' });
    expect(options.json()).toEqual({ options: ['Yes', 'No', 'Later'] });
  });

  it('lets the owner clean a cancelled proposal once', async () => {
    await createProposal();
    clock.set(START + 10);
    await ctx.app.inject({ method: 'POST', url: '/proposals/1/votes', headers: asAccount('alice'), payload: { option: 0 } });
    await ctx.app.inject({ method: 'POST', url: '/proposals/1/cancel', headers: asAccount(MULTISIG) });

    const denied = await ctx.app.inject({ method: 'DELETE', url: '/proposals/1/voters/alice', headers: asAccount(MULTISIG) });
    expect(denied.statusCode).toBe(403);
    expect(denied.json().error.code).toBe('only_owner');

    const cleaned = await ctx.app.inject({ method: 'DELETE', url: '/proposals/1/voters/alice', headers: asAccount(OWNER) });
    expect(cleaned.json()).toEqual({ ok: true });

    const again = await ctx.app.inject({ method: 'DELETE', url: '/proposals/1/voters/bob', headers: asAccount(OWNER) });
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('proposal_data_already_removed');
  });

  describe('administration', () => {
    it('updates voting parameters and the delegator limit', async () => {
      const params = await ctx.app.inject({
        method: 'PUT',
        url: '/admin/voting-params',
        headers: asAccount(MULTISIG),
        payload: { voteDelay: 0, voteDuration: 60, timelockDuration: 0 },
      });
      expect(params.json()).toEqual({ params: { voteDelay: 0, voteDuration: 60, timelockDuration: 0, maxDelegators: 3 } });

      const invalid = await ctx.app.inject({
        method: 'PUT',
        url: '/admin/voting-params',
        headers: asAccount(MULTISIG),
        payload: { voteDelay: 0, voteDuration: 0, timelockDuration: 0 },
      });
      expect(invalid.statusCode).toBe(400);
      expect(invalid.json().error.code).toBe('invalid_payload');

      const limit = await ctx.app.inject({
        method: 'PUT',
        url: '/admin/max-delegators',
        headers: asAccount(OWNER),
        payload: { maxDelegators: 7 },
      });
      expect(limit.json()).toEqual({ maxDelegators: 7 });
    });

    it('hands over the multisig controller and ownership', async () => {
      const multisig = await ctx.app.inject({
        method: 'PUT',
        url: '/admin/multisig',
        headers: asAccount(OWNER),
        payload: { account: 'council' },
      });
      expect(multisig.json()).toEqual({ multisig: 'council' });

      await ctx.app.inject({
        method: 'POST',
        url: '/admin/ownership/transfer',
        headers: asAccount(OWNER),
        payload: { account: 'alice' },
      });
      const wrong = await ctx.app.inject({ method: 'POST', url: '/admin/ownership/accept', headers: asAccount('bob') });
      expect(wrong.statusCode).toBe(403);
      expect(wrong.json().error.code).toBe('only_pending_owner');

      const accepted = await ctx.app.inject({ method: 'POST', url: '/admin/ownership/accept', headers: asAccount('alice') });
      expect(accepted.json()).toEqual({ owner: 'alice' });

      const renounce = await ctx.app.inject({ method: 'POST', url: '/admin/ownership/renounce', headers: asAccount('alice') });
      expect(renounce.statusCode).toBe(403);
      expect(renounce.json().error.code).toBe('renounce_disabled');

      const settings = await ctx.app.inject({ method: 'GET', url: '/params' });
      expect(settings.json()).toMatchObject({ owner: 'alice', pendingOwner: null, multisig: 'council' });
    });
  });
});
