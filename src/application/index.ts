export { buildSubmission, captureSubmission, GENERIC_ERROR_BODY } from './capture.js';
export type { EnvelopePublisher, CaptureOptions, CaptureResult } from './capture.js';
export { streamEnvelopeSchema } from './envelope-schema.js';
export type { StreamEnvelope } from './envelope-schema.js';
export type { ItemStore, NewItem } from './item-store.js';
export { processEnvelope, normalizeFields, validateEnvelope, isSettled } from './processor.js';
export type { ProcessorDeps, ProcessOutcome } from './processor.js';
export { transitionStatus, defaultModerationPolicy } from './moderation.js';
export type { ModerationPolicy, TransitionResult } from './moderation.js';
export { withTimeout, TimeoutError } from './timeout.js';
export type { PipelineLogger } from './logger.js';
