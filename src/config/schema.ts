/**
 * @module config/schema
 * @description Validated configuration for one modem bridge.
 *
 * Keys are the camelCase forms of the packer/parser parameters. Every
 * field has a default, so `{}` is a complete configuration.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../logger.js";
import { HEADER_LENGTH, MAX_ENVELOPE_LENGTH, NAV_LAYOUT, layoutSize } from "../codec/index.js";
import { FIXED_MESSAGE_TYPES } from "../primitives/type-registry.js";
import { DEFAULT_REQUIRING_ACK } from "../primitives/incoming-pipeline.js";

const TypeIdSchema = z.number().int().min(1).max(255);
const NameSchema = z.string().trim().min(1);

/** A general type read from a local topic and sent over the link. */
export const GeneralOutgoingSchema = z
  .object({
    name: NameSchema,
    id: TypeIdSchema,
    subscribeTopic: NameSchema,
    messageType: NameSchema,
  })
  .strict();

/** A general type received over the link and republished on a local topic. */
export const GeneralIncomingSchema = z
  .object({
    name: NameSchema,
    id: TypeIdSchema,
    publishTopic: NameSchema,
    messageType: NameSchema,
  })
  .strict();

export const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

const ModemConfigObjectSchema = z
  .object({
    name: NameSchema.default("packer_parser"),
    targetAddress: z.number().int().min(0).max(255).default(5),
    requiringAck: z.array(NameSchema).default(() => [...DEFAULT_REQUIRING_ACK]),
    // Accepted for compatibility; nothing retransmits yet.
    retries: z.number().int().min(0).default(3),
    retryDelay: z.number().positive().default(30),
    // Nav is the largest fixed body; every fixed type and its ack must fit.
    maxEnvelopeLength: z
      .number()
      .int()
      .min(HEADER_LENGTH + layoutSize(NAV_LAYOUT))
      .max(0xffff)
      .default(MAX_ENVELOPE_LENGTH),
    generalMessagesOutgoing: z.array(GeneralOutgoingSchema).default([]),
    generalMessagesIncoming: z.array(GeneralIncomingSchema).default([]),
    logging: LoggingSchema.default({}),
  })
  .strict();

type ModemConfigShape = z.infer<typeof ModemConfigObjectSchema>;
type GeneralEntryShape = { name: string; id: number; messageType: string };

const FIXED_BY_NAME = new Map(FIXED_MESSAGE_TYPES.map((d): [string, number] => [d.name, d.id]));
const FIXED_BY_ID = new Map(FIXED_MESSAGE_TYPES.map((d): [number, string] => [d.id, d.name]));

/**
 * Checks that span several fields. The registry would reject the same
 * conflicts at start-up; catching them here reports them as config paths.
 */
function checkGeneralTypes(config: ModemConfigShape, ctx: z.RefinementCtx): void {
  const names = new Map<string, { id: number; messageType: string }>();
  const ids = new Map<number, string>();

  const lists: Array<[string, readonly GeneralEntryShape[]]> = [
    ["generalMessagesOutgoing", config.generalMessagesOutgoing],
    ["generalMessagesIncoming", config.generalMessagesIncoming],
  ];

  for (const [key, entries] of lists) {
    const seenInList = new Set<string>();
    entries.forEach((entry, index) => {
      const path = [key, index];

      if (FIXED_BY_NAME.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "name"],
          message: `"${entry.name}" is a fixed message type`,
        });
        return;
      }
      const fixedName = FIXED_BY_ID.get(entry.id);
      if (fixedName !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "id"],
          message: `id ${entry.id} is reserved for "${fixedName}"`,
        });
        return;
      }
      if (seenInList.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "name"],
          message: `"${entry.name}" is listed twice`,
        });
        return;
      }
      seenInList.add(entry.name);

      const known = names.get(entry.name);
      if (known && (known.id !== entry.id || known.messageType !== entry.messageType)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "name"],
          message: `"${entry.name}" is configured with id ${known.id} (${known.messageType}) elsewhere`,
        });
        return;
      }
      const owner = ids.get(entry.id);
      if (owner !== undefined && owner !== entry.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "id"],
          message: `id ${entry.id} is already used by "${owner}"`,
        });
        return;
      }
      names.set(entry.name, { id: entry.id, messageType: entry.messageType });
      ids.set(entry.id, entry.name);
    });
  }

  const topics = new Set<string>();
  config.generalMessagesOutgoing.forEach((entry, index) => {
    if (topics.has(entry.subscribeTopic)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["generalMessagesOutgoing", index, "subscribeTopic"],
        message: `topic "${entry.subscribeTopic}" already feeds another type`,
      });
    }
    topics.add(entry.subscribeTopic);
  });

  config.requiringAck.forEach((name, index) => {
    if (name === "ack") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["requiringAck", index],
        message: "acks are never acknowledged",
      });
    } else if (!FIXED_BY_NAME.has(name) && !names.has(name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["requiringAck", index],
        message: `unknown message type "${name}"`,
      });
    }
  });
}

export const ModemConfigSchema = ModemConfigObjectSchema.superRefine(checkGeneralTypes);

export type ModemConfig = z.infer<typeof ModemConfigSchema>;
export type ModemConfigInput = z.input<typeof ModemConfigSchema>;
export type GeneralOutgoingConfig = z.infer<typeof GeneralOutgoingSchema>;
export type GeneralIncomingConfig = z.infer<typeof GeneralIncomingSchema>;
