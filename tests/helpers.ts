import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { expect } from 'vitest';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { GovernanceEngine, RecordingEnv } from '../src/domain/governance/governanceEngine.js';
import { GovernanceState, VotingParams } from '../src/domain/governance/governanceTypes.js';
import { CreateProposalInput } from '../src/domain/governance/proposalRegistry.js';
import { InMemoryWeightSource } from '../src/domain/governance/weightSource.js';
import { parseWeight } from '../src/domain/governance/weights.js';
import { DomainError, ErrorCode } from '../src/errors/taxonomy.js';
import { createDefaultState, GovernanceSeed } from '../src/infra/storage/defaultState.js';
import { ManualClock } from '../src/utils/time.js';

export const OWNER = 'owner';
export const MULTISIG = 'multisig';

export const START = 1_000;

export function sumWeights(values: readonly string[]): bigint {
  return values.reduce((total, value) => total + parseWeight(value), 0n);
}

/** voteStart = now + 10, voteEnd = voteStart + 100, timelockEnd = voteEnd + 50. */
export const TEST_PARAMS: VotingParams = {
  voteDelay: 10,
  voteDuration: 100,
  timelockDuration: 50,
  maxDelegators: 3,
};

export const TEST_SEED: GovernanceSeed = {
  access: { owner: OWNER, multisig: MULTISIG },
  params: TEST_PARAMS,
};

export const proposalInput = (overrides: Partial<CreateProposalInput> = {}): CreateProposalInput => ({
  type: 'standard',
  description: 'Adopt the new fee schedule',
  docRef: 'docs/fees.md',
  options: ['A', 'B'],
  minimumVotes: 1,
  ...overrides,
});

export interface EngineFixture {
  state: GovernanceState;
  clock: ManualClock;
  weights: InMemoryWeightSource;
  env: RecordingEnv;
  engine: GovernanceEngine;
}

export function createEngineFixture(
  weights: Record<string, bigint> = {},
  params: Partial<VotingParams> = {},
): EngineFixture {
  const state = createDefaultState({ ...TEST_SEED, params: { ...TEST_PARAMS, ...params } });
  const clock = new ManualClock(START);
  const source = new InMemoryWeightSource(weights);
  const env = new RecordingEnv(clock, source);
  return { state, clock, weights: source, env, engine: new GovernanceEngine(state, env) };
}

/** Runs `fn`, asserting it throws a DomainError carrying `code`. */
export function expectDomainError(fn: () => unknown, code: ErrorCode): DomainError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(DomainError);
  if (!(caught instanceof DomainError)) {
    throw new Error(`expected DomainError ${code}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export const buildTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'state.json'),
    logFile: path.join(dir, 'events.ndjson'),
    weightsFile: path.join(dir, 'weights.json'),
  },
  access: { owner: OWNER, multisig: MULTISIG },
  governance: {
    voteDelaySeconds: TEST_PARAMS.voteDelay,
    voteDurationSeconds: TEST_PARAMS.voteDuration,
    timelockSeconds: TEST_PARAMS.timelockDuration,
    maxDelegators: TEST_PARAMS.maxDelegators,
  },
  logging: { level: 'debug' },
});

export async function readLogLines(logFile: string): Promise<Array<Record<string, unknown>>> {
  const raw = await fs.readFile(logFile, 'utf-8');
  return raw
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): Record<string, unknown> => JSON.parse(line));
}
