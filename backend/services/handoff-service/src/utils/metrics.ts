import client from 'prom-client';

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const handoffMetrics = {
  stateTransitions: new client.Counter({
    name: 'handoff_operation_state_transitions_total',
    help: 'Total number of pending-operation state transitions',
    labelNames: ['from_state', 'to_state'],
    registers: [register],
  }),

  tokenRedemptions: new client.Counter({
    name: 'handoff_token_redemptions_total',
    help: 'Transfer token redemption attempts by outcome',
    labelNames: ['outcome'],
    registers: [register],
  }),

  tokensIssued: new client.Counter({
    name: 'handoff_tokens_issued_total',
    help: 'Total number of transfer tokens issued',
    registers: [register],
  }),

  expirations: new client.Counter({
    name: 'handoff_expirations_total',
    help: 'Operations and tokens moved to expired by the enforcer',
    labelNames: ['resource'],
    registers: [register],
  }),

  realtimeSubscribers: new client.Gauge({
    name: 'handoff_realtime_subscribers',
    help: 'Number of open realtime status subscriptions on this instance',
    registers: [register],
  }),
};
