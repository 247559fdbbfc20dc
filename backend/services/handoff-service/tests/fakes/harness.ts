import jwt from 'jsonwebtoken';
import { AwilixContainer } from 'awilix';
import { HandoffConfig, loadConfig } from '../../src/config';
import { createDependencyContainer, HandoffCradle } from '../../src/config/dependencies';
import { Actor, Ticket } from '../../src/types/handoff.types';
import { logger } from '../../src/utils/logger';
import { InMemoryHandoffStore } from './in-memory-store';
import { InMemoryStatusBus } from './in-memory-bus';
import { RecordingScheduler } from './recording-scheduler';
import { InMemoryIdempotencyStore } from './in-memory-idempotency';
import { ManualClock } from './manual-clock';

export const ALICE: Actor = { id: '0b6f2c1e-1111-4a5b-9c3d-000000000001', email: 'alice@example.com', displayName: 'Alice' };
export const BOB: Actor = { id: '0b6f2c1e-2222-4a5b-9c3d-000000000002', email: 'bob@example.com', displayName: 'Bob' };
export const CAROL: Actor = { id: '0b6f2c1e-3333-4a5b-9c3d-000000000003', email: 'carol@example.com', displayName: 'Carol' };

export const TICKET_ID = '7d1a0c52-0000-4e21-8f00-00000000a001';
export const EVENT_ID = '7d1a0c52-0000-4e21-8f00-00000000e001';

export interface Harness {
  config: HandoffConfig;
  store: InMemoryHandoffStore;
  bus: InMemoryStatusBus;
  scheduler: RecordingScheduler;
  idempotency: InMemoryIdempotencyStore;
  clock: ManualClock;
  container: AwilixContainer<HandoffCradle>;
  cradle: HandoffCradle;
}

export function createHarness(overrides: Partial<HandoffConfig['handoff']> = {}): Harness {
  const base = loadConfig();
  const config: HandoffConfig = { ...base, handoff: { ...base.handoff, ...overrides } };
  const store = new InMemoryHandoffStore();
  const bus = new InMemoryStatusBus();
  const scheduler = new RecordingScheduler();
  const idempotency = new InMemoryIdempotencyStore();
  const clock = new ManualClock();

  const container = createDependencyContainer({
    config,
    store,
    statusBus: bus,
    scheduler,
    idempotencyStore: idempotency,
    readinessChecks: { store: () => store.ping() },
    clock,
    logger,
  });

  store.addActor(ALICE);
  store.addActor(BOB);
  store.addActor(CAROL);
  store.addTicket(ticketOwnedBy(ALICE.id));

  return { config, store, bus, scheduler, idempotency, clock, container, cradle: container.cradle };
}

export function ticketOwnedBy(ownerActorId: string, id = TICKET_ID): Ticket {
  return {
    id,
    ticketNumber: `TKT-${id.slice(-4)}`,
    eventId: EVENT_ID,
    ownerActorId,
    ownerEmail: null,
    version: 1,
  };
}

export function accessToken(config: HandoffConfig, actor: Actor, secret = config.auth.jwtSecret): string {
  return jwt.sign({ sub: actor.id, email: actor.email }, secret, {
    algorithm: 'HS256',
    issuer: config.auth.issuer,
    audience: config.auth.audience,
    expiresIn: '15m',
  });
}

export function bearer(config: HandoffConfig, actor: Actor): { authorization: string } {
  return { authorization: `Bearer ${accessToken(config, actor)}` };
}
