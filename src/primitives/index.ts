/**
 * @module primitives
 * @description Type registry, counters, clock and the two envelope
 * pipelines, plus the base event emitter.
 */

export { EnvelopeEmitter } from "./base-emitter.js";
export { TypeRegistry, FIXED_MESSAGE_TYPES, registeredLayouts } from "./type-registry.js";
export { SequenceCounter } from "./sequence-counter.js";
export { systemClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { OutgoingPipeline } from "./outgoing-pipeline.js";
export type { Envelope, OutgoingPipelineOptions } from "./outgoing-pipeline.js";
export { IncomingPipeline, DEFAULT_REQUIRING_ACK } from "./incoming-pipeline.js";
export type {
  AckSender,
  IncomingPipelineOptions,
  MessageHandler,
  ReceiveResult,
  ReceiveStage,
  TypedMessageKind,
} from "./incoming-pipeline.js";
