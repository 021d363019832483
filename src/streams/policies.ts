import { z } from 'zod';
import { InvalidArgumentError, ok, fail, type StreamResult } from '../core/errors';
import { describeIssues } from '../core/codecs';
import { StreamId } from './identifier';

export interface NewMessagesPolicy {
  readonly count: number;
  /** 0 disables blocking */
  readonly blockMs: number;
}

export interface PendingMessagesPolicy {
  readonly count: number;
}

export interface ClaimPolicy {
  readonly count: number;
  readonly minIdleMs: number;
}

/** Where a newly created group starts delivering from */
export type StartPosition = 'beginning' | 'only-future' | StreamId;

export interface ConsumerConfig {
  readonly streamName: string;
  readonly groupName: string;
  readonly consumerName: string;
  readonly startFrom: StartPosition;
  /** Target number of messages per consume() call */
  readonly batchSize: number;
  readonly newMessages: NewMessagesPolicy;
  readonly pendingMessages: PendingMessagesPolicy;
  readonly claimMessages: ClaimPolicy;
}

export interface ProducerConfig {
  readonly streamName: string;
  /** Approximate MAXLEN trim applied on every append; null keeps everything */
  readonly maxLen: number | null;
}

const nameSchema = z.string().min(1, 'must not be empty');
const countSchema = z.number().int().nonnegative();
const durationSchema = z.number().int().nonnegative();

const consumerConfigSchema = z
  .object({
    streamName: nameSchema,
    groupName: nameSchema,
    consumerName: nameSchema,
    startFrom: z.union([
      z.literal('beginning'),
      z.literal('only-future'),
      z.custom<StreamId>((value) => value instanceof StreamId, 'must be a StreamId'),
    ]),
    batchSize: z.number().int().positive(),
    newMessages: z.object({ count: countSchema, blockMs: durationSchema }),
    pendingMessages: z.object({ count: countSchema }),
    claimMessages: z.object({ count: countSchema, minIdleMs: durationSchema }),
  })
  .refine(
    (c) => c.newMessages.count + c.pendingMessages.count + c.claimMessages.count > 0,
    { message: 'at least one read policy needs a positive count', path: ['newMessages', 'count'] }
  );

const producerConfigSchema = z.object({
  streamName: nameSchema,
  maxLen: z.number().int().positive().nullable(),
});

function invalid(prefix: string, error: z.ZodError): InvalidArgumentError {
  return new InvalidArgumentError(`${prefix}: ${describeIssues(error)}`);
}

/**
 * Validate and freeze a consumer configuration
 */
export function parseConsumerConfig(input: ConsumerConfig): StreamResult<ConsumerConfig> {
  const parsed = consumerConfigSchema.safeParse(input);
  if (!parsed.success) {
    return fail(invalid('Invalid consumer config', parsed.error));
  }

  const c = parsed.data;
  return ok(
    Object.freeze({
      streamName: c.streamName,
      groupName: c.groupName,
      consumerName: c.consumerName,
      startFrom: c.startFrom,
      batchSize: c.batchSize,
      newMessages: Object.freeze({ ...c.newMessages }),
      pendingMessages: Object.freeze({ ...c.pendingMessages }),
      claimMessages: Object.freeze({ ...c.claimMessages }),
    })
  );
}

export function parseProducerConfig(input: ProducerConfig): StreamResult<ProducerConfig> {
  const parsed = producerConfigSchema.safeParse(input);
  if (!parsed.success) {
    return fail(invalid('Invalid producer config', parsed.error));
  }
  return ok(Object.freeze({ ...parsed.data }));
}

/**
 * Id argument for XGROUP CREATE
 */
export function groupStartId(position: StartPosition): string {
  if (position === 'beginning') return StreamId.MIN.toString();
  if (position === 'only-future') return '$';
  return position.toString();
}
