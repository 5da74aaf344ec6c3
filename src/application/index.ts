export { ingestEventSchema } from './event-schema.js';
export type { IngestEventInput } from './event-schema.js';
export { EventStore } from './event-store.js';
export { AlertDispatcher } from './alert-dispatcher.js';
export type { AlertDispatcherOptions, DispatchOutcome } from './alert-dispatcher.js';
export { formatAlertMessage } from './alert-message.js';
export type { AlertMessage } from './alert-message.js';
export { IngestionPipeline, toSecondTimestamp } from './ingestion-pipeline.js';
export type { AlertSink, IngestionPipelineDeps, EventSummary } from './ingestion-pipeline.js';
export { exportCsv } from './csv-export.js';
