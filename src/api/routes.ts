import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { MAX_OPTIONS, PROPOSAL_TYPES } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { GovernanceService } from '../services/governanceService.js';

export interface RuntimeMetrics {
  uptimeSeconds: number;
  processPid: number;
  wsClients: number;
}

interface RouteDeps {
  config: AppConfig;
  governanceService: GovernanceService;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const CALLER_HEADER = 'x-account';

const account = z.string().trim().min(1).max(128);

const proposalParamsSchema = z.object({
  id: z.coerce.number().int().nonnegative(),
});

const proposalAccountParamsSchema = proposalParamsSchema.extend({
  account,
});

const proposalVoterParamsSchema = proposalParamsSchema.extend({
  voter: account,
});

const optionParamsSchema = proposalParamsSchema.extend({
  index: z.coerce.number().int().nonnegative(),
});

const accountParamsSchema = z.object({ account });

// Option count is checked by the engine so that its named errors reach the caller.
const proposalDetailsSchema = z.object({
  type: z.enum(PROPOSAL_TYPES),
  description: z.string().min(1).max(10_000),
  docRef: z.string().max(512).default(''),
  options: z.array(z.string().trim().min(1).max(200)).max(MAX_OPTIONS * 4),
});

const createProposalSchema = proposalDetailsSchema.extend({
  minimumVotes: z.number().int().nonnegative(),
});

const extendVotingSchema = z.object({
  additionalTime: z.number().int().positive(),
});

const castVoteSchema = z.object({
  option: z.number().int().nonnegative(),
});

const delegateSchema = z.object({
  to: z.string().trim().max(128),
});

const votingParamsSchema = z.object({
  voteDelay: z.number().int().nonnegative(),
  voteDuration: z.number().int().positive(),
  timelockDuration: z.number().int().nonnegative(),
});

const maxDelegatorsSchema = z.object({
  maxDelegators: z.number().int().positive(),
});

const accountBodySchema = z.object({ account });

const proposalListQuerySchema = z.object({
  status: z.enum(['active', 'cancelled']).default('active'),
});

const delegateeQuerySchema = z.object({
  proposalId: z.coerce.number().int().nonnegative(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, what: string, error: z.ZodError): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, `Invalid ${what}.`, error.flatten()));

const callerOf = (request: FastifyRequest): string | null => {
  const header = request.headers[CALLER_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const requireCaller = (request: FastifyRequest, reply: FastifyReply): string | null => {
  const caller = callerOf(request);
  if (!caller) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.MissingCaller,
      `Missing ${CALLER_HEADER} header.`,
    ));
    return null;
  }
  return caller;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const gov = deps.governanceService;

  /** Parse, call, and map domain failures; shared by every route below. */
  const handle = async <T>(reply: FastifyReply, work: () => Promise<T> | T, status = 200): Promise<T | undefined> => {
    try {
      const result = await work();
      reply.code(status);
      return result;
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  };

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
  }));

  app.get('/health', async () => ({
    status: 'ok',
    env: deps.config.app.env,
    ...deps.getRuntimeMetrics(),
    proposals: gov.getStats().proposals,
  }));

  app.get('/stats', async () => gov.getStats());

  app.get('/params', async () => gov.getSettings());

  // ─── Proposals ────────────────────────────────────────────────────────

  app.get('/proposals', async (request, reply) => {
    const parse = proposalListQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'query params', parse.error);

    return { status: parse.data.status, proposalIds: gov.listProposalIds(parse.data.status) };
  });

  app.post('/proposals', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = createProposalSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => ({ proposal: await gov.createProposal(caller, parse.data) }), 201);
  });

  app.get('/proposals/:id', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => ({ proposal: gov.getProposal(params.data.id) }));
  });

  app.patch('/proposals/:id', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const parse = proposalDetailsSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => ({
      proposal: await gov.updateProposalDetails(caller, params.data.id, parse.data),
    }));
  });

  app.post('/proposals/:id/cancel', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, async () => ({ proposal: await gov.cancelProposal(caller, params.data.id) }));
  });

  app.post('/proposals/:id/extend', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const parse = extendVotingSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => ({
      proposal: await gov.extendVoting(caller, params.data.id, parse.data.additionalTime),
    }));
  });

  app.post('/proposals/:id/execute', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, async () => ({ proposal: await gov.executeProposal(caller, params.data.id) }));
  });

  app.get('/proposals/:id/options', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => ({ options: gov.getOptions(params.data.id) }));
  });

  app.get('/proposals/:id/options/:index/tally', async (request, reply) => {
    const params = optionParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => ({
      proposalId: params.data.id,
      option: params.data.index,
      weight: gov.getOptionTally(params.data.id, params.data.index),
    }));
  });

  app.get('/proposals/:id/winner', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => gov.getWinningOption(params.data.id));
  });

  // ─── Votes ────────────────────────────────────────────────────────────

  app.post('/proposals/:id/votes', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const parse = castVoteSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, () => gov.castVote(caller, params.data.id, parse.data.option), 201);
  });

  app.get('/proposals/:id/voters', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => ({ voters: gov.listVoters(params.data.id) }));
  });

  app.get('/proposals/:id/votes/:account', async (request, reply) => {
    const params = proposalAccountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, () => ({
      account: params.data.account,
      vote: gov.getVoteChoice(params.data.id, params.data.account),
    }));
  });

  app.get('/proposals/:id/voted/:account', async (request, reply) => {
    const params = proposalAccountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return {
      account: params.data.account,
      voted: gov.hasVoted(params.data.id, params.data.account),
    };
  });

  app.delete('/proposals/:id/voters/:voter', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalVoterParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, async () => {
      await gov.removeCancelledProposalData(caller, params.data.voter, params.data.id);
      return { ok: true };
    });
  });

  // ─── Delegation ───────────────────────────────────────────────────────

  app.post('/delegation', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = delegateSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => {
      await gov.delegateGlobally(caller, parse.data.to);
      return { delegator: caller, delegatee: parse.data.to, proposalId: null };
    }, 201);
  });

  app.delete('/delegation', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;

    return handle(reply, async () => {
      await gov.revokeGlobalDelegation(caller);
      return { ok: true };
    });
  });

  app.post('/proposals/:id/delegation', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const parse = delegateSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => {
      await gov.delegateForProposal(caller, params.data.id, parse.data.to);
      return { delegator: caller, delegatee: parse.data.to, proposalId: params.data.id };
    }, 201);
  });

  app.delete('/proposals/:id/delegation', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return handle(reply, async () => {
      await gov.revokeProposalDelegation(caller, params.data.id);
      return { ok: true };
    });
  });

  app.get('/proposals/:id/delegates/:account', async (request, reply) => {
    const params = proposalAccountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return {
      account: params.data.account,
      delegatee: gov.effectiveDelegatee(params.data.id, params.data.account),
    };
  });

  app.get('/delegates/:account/delegators', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const query = delegateeQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, 'query params', query.error);

    return {
      delegatee: params.data.account,
      proposalId: query.data.proposalId,
      delegators: gov.proposalDelegators(query.data.proposalId, params.data.account),
    };
  });

  app.get('/delegates/:account/count', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);
    const query = delegateeQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, 'query params', query.error);

    return {
      delegatee: params.data.account,
      proposalId: query.data.proposalId,
      count: gov.delegatorCount(params.data.account, query.data.proposalId),
    };
  });

  // ─── Accounts ─────────────────────────────────────────────────────────

  app.get('/accounts/:account', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'path params', params.error);

    return gov.getAccount(params.data.account);
  });

  // ─── Administration ───────────────────────────────────────────────────

  app.put('/admin/voting-params', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = votingParamsSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => ({ params: await gov.updateVotingParams(caller, parse.data) }));
  });

  app.put('/admin/max-delegators', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = maxDelegatorsSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => {
      await gov.setMaxDelegators(caller, parse.data.maxDelegators);
      return { maxDelegators: parse.data.maxDelegators };
    });
  });

  app.put('/admin/multisig', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = accountBodySchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => {
      await gov.changeMultisig(caller, parse.data.account);
      return { multisig: parse.data.account };
    });
  });

  app.post('/admin/ownership/transfer', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;
    const parse = accountBodySchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'request payload', parse.error);

    return handle(reply, async () => {
      await gov.transferOwnership(caller, parse.data.account);
      return { pendingOwner: parse.data.account };
    });
  });

  app.post('/admin/ownership/accept', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;

    return handle(reply, async () => {
      await gov.acceptOwnership(caller);
      return { owner: caller };
    });
  });

  app.post('/admin/ownership/renounce', async (request, reply) => {
    const caller = requireCaller(request, reply);
    if (!caller) return undefined;

    return handle(reply, () => gov.renounceOwnership(caller));
  });
}
