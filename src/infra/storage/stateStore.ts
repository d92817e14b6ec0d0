import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { recordFromEntries } from '../../domain/governance/accountRecords.js';
import { PROPOSAL_STATUSES, PROPOSAL_TYPES, GovernanceState } from '../../domain/governance/governanceTypes.js';
import { createDefaultState, GovernanceSeed } from './defaultState.js';

const weightString = z.string().regex(/^\d+$/);
const accountList = z.array(z.string());
const idList = z.array(z.number().int().positive());

// z.record drops a `__proto__` key; account names may be any string.
const accountRecord = <T>(value: z.ZodType<T>) => z
  .custom<Record<string, unknown>>(
    (raw) => typeof raw === 'object' && raw !== null && !Array.isArray(raw),
    'Expected an object keyed by account',
  )
  .transform((raw) => Object.entries(raw))
  .pipe(z.array(z.tuple([z.string(), value])))
  .transform((entries) => recordFromEntries(entries));

const proposalSchema = z.object({
  id: z.number().int().positive(),
  type: z.enum(PROPOSAL_TYPES),
  status: z.enum(PROPOSAL_STATUSES),
  description: z.string(),
  docRef: z.string(),
  options: z.array(z.string()),
  createdAt: z.number().int(),
  voteStart: z.number().int(),
  voteEnd: z.number().int(),
  timelockEnd: z.number().int(),
  minimumVotes: z.number().int().nonnegative(),
  votingStarted: z.boolean(),
  winningOption: z.number().int(),
  highestWeight: weightString,
  votesCounted: z.number().int().nonnegative(),
  extensions: z.number().int().nonnegative(),
});

const voteRecordSchema = z.object({
  voted: z.boolean(),
  option: z.number().int().nonnegative(),
  proxy: z.string().optional(),
});

const persistedStateSchema = z.object({
  access: z.object({
    owner: z.string(),
    pendingOwner: z.string().nullable().default(null),
    multisig: z.string(),
  }),
  params: z.object({
    voteDelay: z.number().int().nonnegative(),
    voteDuration: z.number().int().positive(),
    timelockDuration: z.number().int().nonnegative(),
    maxDelegators: z.number().int().positive(),
  }),
  nextProposalId: z.number().int().positive(),
  proposals: z.record(proposalSchema),
  votes: z.record(accountRecord(voteRecordSchema)),
  tallies: z.record(z.array(weightString)),
  voters: z.record(accountList),
  votedProposals: accountRecord(idList),
  streaks: accountRecord(z.number().int().nonnegative()),
  activeProposalIds: idList,
  cancelledProposalIds: idList,
  cleanedProposalIds: idList.default([]),
  delegation: z.object({
    global: accountRecord(z.string()),
    perProposal: z.record(accountRecord(z.string())),
    globalDelegators: accountRecord(accountList),
    proposalDelegators: z.record(accountRecord(accountList)),
    delegatorCounts: accountRecord(z.number().int().nonnegative()),
  }),
  counters: z.object({
    executed: z.number().int().nonnegative(),
    succeeded: z.number().int().nonnegative(),
    defeated: z.number().int().nonnegative(),
  }),
});

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export const parseState = (raw: unknown, source: string): GovernanceState => {
  const parsed = persistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid governance state in ${source}: ${parsed.error.message}`);
  }
  return parsed.data;
};

/**
 * JSON-file backed governance state.
 *
 * Transactions are serialized and run against a draft copy; the draft
 * replaces the committed state only when the work returns, so a thrown
 * error leaves no trace. Readers always see the last committed state.
 */
export class StateStore {
  private state: GovernanceState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    private readonly seed: GovernanceSeed,
  ) {
    this.state = createDefaultState(seed);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState(this.seed);
      await this.persist();
      return;
    }

    this.state = parseState(JSON.parse(raw), this.stateFilePath);
  }

  snapshot(): GovernanceState {
    return structuredClone(this.state);
  }

  /** Runs a synchronous read against the committed state. The view must not mutate it. */
  read<T>(view: (state: GovernanceState) => T): T {
    return view(this.state);
  }

  async transaction<T>(work: (draft: GovernanceState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      this.state = draft;
      await this.persist();
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(this.state, null, 2));
  }
}
