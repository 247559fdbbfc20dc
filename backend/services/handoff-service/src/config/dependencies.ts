import { asFunction, asValue, AwilixContainer, createContainer, InjectionMode } from 'awilix';
import type { HandoffConfig } from './index';
import { Clock, ExpiryScheduler, systemClock } from '../types/handoff.types';
import { HandoffStore } from '../store/handoff-store';
import { IdempotencyStore } from '../middleware/idempotency.middleware';
import { StatusBus, StatusPublisher } from '../services/status-publisher.service';
import { TransitionRunner } from '../services/operation-transitions';
import { TransferTokenService } from '../services/transfer-token.service';
import { PendingOperationService } from '../services/pending-operation.service';
import { ClaimService } from '../services/claim.service';
import { ExpiryEnforcer } from '../services/expiry-enforcer.service';
import { OperationController } from '../controllers/operation.controller';
import { TransferController } from '../controllers/transfer.controller';
import { RealtimeGateway } from '../realtime/websocket';
import { Logger, logger as rootLogger } from '../utils/logger';

export type ReadinessChecks = Record<string, () => Promise<void>>;

/**
 * Connections and adapters the services run on. Production wires Postgres,
 * Redis and Bull; tests pass in-process stand-ins.
 */
export interface HandoffInfrastructure {
  config: HandoffConfig;
  store: HandoffStore;
  statusBus: StatusBus;
  scheduler: ExpiryScheduler;
  idempotencyStore: IdempotencyStore;
  readinessChecks: ReadinessChecks;
  clock?: Clock;
  logger?: Logger;
}

export interface HandoffCradle {
  config: HandoffConfig;
  logger: Logger;
  clock: Clock;
  store: HandoffStore;
  statusBus: StatusBus;
  scheduler: ExpiryScheduler;
  idempotencyStore: IdempotencyStore;
  readinessChecks: ReadinessChecks;

  statusPublisher: StatusPublisher;
  transitionRunner: TransitionRunner;
  transferTokenService: TransferTokenService;
  pendingOperationService: PendingOperationService;
  claimService: ClaimService;
  expiryEnforcer: ExpiryEnforcer;
  realtimeGateway: RealtimeGateway;

  operationController: OperationController;
  transferController: TransferController;
}

declare module 'fastify' {
  interface FastifyInstance {
    container: AwilixContainer<HandoffCradle>;
  }
}

export const createDependencyContainer = (infra: HandoffInfrastructure): AwilixContainer<HandoffCradle> => {
  const container = createContainer<HandoffCradle>({
    injectionMode: InjectionMode.PROXY,
  });

  container.register({
    config: asValue(infra.config),
    logger: asValue(infra.logger ?? rootLogger),
    clock: asValue(infra.clock ?? systemClock),
    store: asValue(infra.store),
    statusBus: asValue(infra.statusBus),
    scheduler: asValue(infra.scheduler),
    idempotencyStore: asValue(infra.idempotencyStore),
    readinessChecks: asValue(infra.readinessChecks),

    statusPublisher: asFunction(
      ({ statusBus, store, logger }: HandoffCradle) => new StatusPublisher(statusBus, store, logger)
    ).singleton(),

    transitionRunner: asFunction(
      ({ store, clock, statusPublisher }: HandoffCradle) => new TransitionRunner(store, clock, statusPublisher)
    ).singleton(),

    transferTokenService: asFunction(
      ({ store, scheduler, clock, config, logger }: HandoffCradle) =>
        new TransferTokenService(store, scheduler, clock, config.handoff, logger)
    ).singleton(),

    pendingOperationService: asFunction(
      ({ store, transitionRunner, transferTokenService, scheduler, clock, config, logger }: HandoffCradle) =>
        new PendingOperationService(
          store,
          transitionRunner,
          transferTokenService,
          scheduler,
          clock,
          config.handoff,
          logger
        )
    ).singleton(),

    claimService: asFunction(
      ({ store, transitionRunner, transferTokenService, clock, logger }: HandoffCradle) =>
        new ClaimService(store, transitionRunner, transferTokenService, clock, logger)
    ).singleton(),

    expiryEnforcer: asFunction(
      ({ store, transitionRunner, clock, config, logger }: HandoffCradle) =>
        new ExpiryEnforcer(store, transitionRunner, clock, config.jobs.expirySweepBatchSize, logger)
    ).singleton(),

    realtimeGateway: asFunction(
      ({ statusPublisher, pendingOperationService, config, logger }: HandoffCradle) =>
        new RealtimeGateway(
          statusPublisher,
          pendingOperationService,
          config.auth,
          config.handoff.realtimeHeartbeatMs,
          logger
        )
    ).singleton(),

    operationController: asFunction(
      ({ pendingOperationService, claimService }: HandoffCradle) =>
        new OperationController(pendingOperationService, claimService)
    ).singleton(),

    transferController: asFunction(
      ({ transferTokenService, claimService }: HandoffCradle) => new TransferController(transferTokenService, claimService)
    ).singleton(),
  });

  return container;
};
