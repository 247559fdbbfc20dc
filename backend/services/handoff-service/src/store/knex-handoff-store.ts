import { Knex } from 'knex';
import { HandoffRepositories, HandoffStore } from './handoff-store';
import { TicketModel } from '../models/ticket.model';
import { ActorModel } from '../models/actor.model';
import { TransferTokenModel } from '../models/transfer-token.model';
import { PendingOperationModel } from '../models/pending-operation.model';
import { OperationTransitionModel } from '../models/operation-transition.model';
import { PaymentRecordModel } from '../models/payment-record.model';
import { DeferredDeliveryModel } from '../models/deferred-delivery.model';

function repositories(db: Knex): HandoffRepositories {
  return {
    tickets: new TicketModel(db),
    actors: new ActorModel(db),
    tokens: new TransferTokenModel(db),
    operations: new PendingOperationModel(db),
    transitions: new OperationTransitionModel(db),
    payments: new PaymentRecordModel(db),
    deliveries: new DeferredDeliveryModel(db),
  };
}

export class KnexHandoffStore implements HandoffStore {
  readonly tickets: HandoffRepositories['tickets'];
  readonly actors: HandoffRepositories['actors'];
  readonly tokens: HandoffRepositories['tokens'];
  readonly operations: HandoffRepositories['operations'];
  readonly transitions: HandoffRepositories['transitions'];
  readonly payments: HandoffRepositories['payments'];
  readonly deliveries: HandoffRepositories['deliveries'];

  constructor(private readonly db: Knex) {
    const repos = repositories(db);
    this.tickets = repos.tickets;
    this.actors = repos.actors;
    this.tokens = repos.tokens;
    this.operations = repos.operations;
    this.transitions = repos.transitions;
    this.payments = repos.payments;
    this.deliveries = repos.deliveries;
  }

  transaction<T>(work: (repos: HandoffRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => work(repositories(trx)));
  }

  async ping(): Promise<void> {
    await this.db.raw('SELECT 1');
  }
}
