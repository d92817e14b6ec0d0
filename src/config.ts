import dotenv from 'dotenv';
import path from 'node:path';
import { isLogLevel, LogLevel } from './infra/logger.js';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseLevel = (input: string | undefined, fallback: LogLevel): LogLevel => {
  if (input === undefined) return fallback;
  const level = input.toLowerCase();
  return isLogLevel(level) ? level : fallback;
};

const DAY_SECONDS = 24 * 60 * 60;

export const config = {
  app: {
    name: 'weighted-governance-engine',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'governance-state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
    weightsFile: process.env.WEIGHTS_FILE ?? path.resolve(process.cwd(), 'data', 'weights.json'),
  },
  access: {
    owner: process.env.OWNER_ACCOUNT ?? 'owner',
    multisig: process.env.MULTISIG_ACCOUNT ?? 'multisig',
  },
  governance: {
    voteDelaySeconds: parseNumber(process.env.VOTE_DELAY_SECONDS, DAY_SECONDS),
    voteDurationSeconds: parseNumber(process.env.VOTE_DURATION_SECONDS, 3 * DAY_SECONDS),
    timelockSeconds: parseNumber(process.env.TIMELOCK_SECONDS, 2 * DAY_SECONDS),
    maxDelegators: parseNumber(process.env.MAX_DELEGATORS, 50),
  },
  logging: {
    level: parseLevel(process.env.LOG_LEVEL, 'info'),
  },
};

export type AppConfig = typeof config;
