import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { connectedClients, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { loadWeightSnapshot, WeightSource } from './domain/governance/weightSource.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { GovernanceService } from './services/governanceService.js';
import { Clock, systemClock } from './utils/time.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  governanceService: GovernanceService;
}

/** Replacements for the process-level collaborators, mainly for tests. */
export interface AppOverrides {
  clock?: Clock;
  weightSource?: WeightSource;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, {
    access: config.access,
    params: {
      voteDelay: config.governance.voteDelaySeconds,
      voteDuration: config.governance.voteDurationSeconds,
      timelockDuration: config.governance.timelockSeconds,
      maxDelegators: config.governance.maxDelegators,
    },
  });
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile, config.logging.level);
  await logger.init();

  const weightSource = overrides.weightSource ?? await loadWeightSnapshot(config.paths.weightsFile);
  const clock = overrides.clock ?? systemClock;

  const governanceService = new GovernanceService(stateStore, logger, clock, weightSource);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    governanceService,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      processPid: process.pid,
      wsClients: connectedClients(),
    }),
  });

  // Register WebSocket live event feed endpoint.
  await registerWebSocket(app);

  return {
    app,
    stateStore,
    logger,
    governanceService,
  };
}
