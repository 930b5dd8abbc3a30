import {
  makeCounterProvider,
  makeGaugeProvider,
} from '@willsoto/nestjs-prometheus';

export const MESSAGES_POSTED_TOTAL = 'sforce_flowdock_messages_posted_total';
export const SALESFORCE_REQUESTS_TOTAL =
  'sforce_flowdock_salesforce_requests_total';
export const LAST_RUN_DURATION_SECONDS =
  'sforce_flowdock_last_run_duration_seconds';
export const LAST_SUCCESS_TIMESTAMP_SECONDS =
  'sforce_flowdock_last_success_timestamp_seconds';

export const metricsProviders = [
  makeCounterProvider({
    name: MESSAGES_POSTED_TOTAL,
    help: 'Flowdock messages by kind and delivery status',
    labelNames: ['kind', 'status'], // kind: new, updated, chatter
  }),
  makeCounterProvider({
    name: SALESFORCE_REQUESTS_TOTAL,
    help: 'SalesForce API requests by operation and status',
    labelNames: ['operation', 'status'],
  }),
  makeGaugeProvider({
    name: LAST_RUN_DURATION_SECONDS,
    help: 'Duration of the last sync run in seconds',
    labelNames: ['status'],
  }),
  makeGaugeProvider({
    name: LAST_SUCCESS_TIMESTAMP_SECONDS,
    help: 'Unix time of the last fully delivered sync run',
  }),
];
