import { z } from 'zod';
import { EmptyReplyError, ok, fail, type StreamResult } from './errors';
import { StreamId } from '../streams/identifier';
import type { ConsumerInfo, GroupInfo, PendingEntry, StreamInfo } from '../streams/types';
import type { Logger } from './logger';

export type FieldInput =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>
  | Iterable<readonly [string, string]>;

/**
 * Entry as read from the stream; `fields` is null when the payload was deleted
 * while the id was still pending.
 */
export interface RawEntry {
  id: StreamId;
  fields: Map<string, string> | null;
}

const idSchema = z.string().transform((value, ctx) => {
  const id = StreamId.tryParse(value);
  if (!id) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid stream id "${value}"` });
    return z.NEVER;
  }
  return id;
});

const fieldListSchema = z
  .array(z.string())
  .refine((arr) => arr.length % 2 === 0, { message: 'odd number of field items' });

const entrySchema = z.tuple([idSchema, fieldListSchema.nullable()]);

const readReplySchema = z.array(z.tuple([z.string(), z.array(entrySchema)])).nullable();

const pendingEntrySchema = z.tuple([idSchema, z.string(), z.number().int(), z.number().int()]);

const pendingRangeSchema = z.array(pendingEntrySchema);

// older servers answer nil for claimed ids whose payload is gone
const claimReplySchema = z.array(entrySchema.nullable());

const countSchema = z.number().int().nonnegative();

const infoEntrySchema = z.tuple([idSchema, fieldListSchema]).nullable();

// XINFO replies are flat key/value lists
const flatRecordSchema = z.array(z.unknown()).transform(toRecord);

const groupInfoSchema = flatRecordSchema.pipe(
  z
    .object({
      name: z.string(),
      consumers: countSchema,
      pending: countSchema,
      'last-delivered-id': idSchema,
      'entries-read': countSchema.nullish(),
      lag: countSchema.nullish(),
    })
    .transform(
      (group): GroupInfo => ({
        name: group.name,
        consumers: group.consumers,
        pending: group.pending,
        lastDeliveredId: group['last-delivered-id'],
        entriesRead: group['entries-read'] ?? null,
        lag: group.lag ?? null,
      })
    )
);

const consumerInfoSchema = flatRecordSchema.pipe(
  z
    .object({
      name: z.string(),
      pending: countSchema,
      idle: countSchema,
      // -1 until the first successful read
      inactive: z.number().int().min(-1).nullish(),
    })
    .transform((consumer): ConsumerInfo => {
      const inactive = consumer.inactive ?? -1;
      return {
        name: consumer.name,
        pending: consumer.pending,
        idleMs: consumer.idle,
        inactiveMs: inactive < 0 ? null : inactive,
      };
    })
);

function toRecord(flat: readonly unknown[]): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    const key = flat[i];
    if (typeof key === 'string') {
      record[key] = flat[i + 1];
    }
  }
  return record;
}

/**
 * One-line summary of zod issues, `path: message; ...`
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function decode<S extends z.ZodTypeAny>(
  schema: S,
  reply: unknown,
  command: string
): StreamResult<z.output<S>> {
  const parsed = schema.safeParse(reply);
  if (!parsed.success) {
    return fail(new EmptyReplyError(`Unexpected ${command} reply: ${describeIssues(parsed.error)}`));
  }
  return ok(parsed.data);
}

/**
 * Convert field input to a flat key-value array for XADD
 */
export function toFlatArray(fields: FieldInput): string[] {
  const arr: string[] = [];
  for (const [k, v] of entriesOf(fields)) {
    arr.push(k, v);
  }
  return arr;
}

export function entriesOf(fields: FieldInput): Array<readonly [string, string]> {
  if (isIterable(fields)) {
    return [...fields];
  }
  return Object.entries(fields);
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}

/**
 * Parse a flat array from Redis into an ordered map
 */
export function fromFlatArray(arr: readonly string[]): Map<string, string> {
  const fields = new Map<string, string>();
  for (let i = 0; i + 1 < arr.length; i += 2) {
    fields.set(arr[i], arr[i + 1]);
  }
  return fields;
}

export function decodeAddedId(reply: unknown): StreamResult<StreamId> {
  return decode(idSchema, reply, 'XADD');
}

/**
 * Decode an XREADGROUP reply, keeping only entries of `streamName`
 */
export function decodeReadReply(
  reply: unknown,
  streamName: string,
  logger?: Logger
): StreamResult<RawEntry[]> {
  const decoded = decode(readReplySchema, reply, 'XREADGROUP');
  if (!decoded.ok) return decoded;

  const entries: RawEntry[] = [];
  for (const [key, items] of decoded.value ?? []) {
    if (key !== streamName) {
      logger?.warn(`Unexpected stream ${key} in reply while reading ${streamName}`);
      continue;
    }
    for (const [id, fields] of items) {
      entries.push({ id, fields: fields ? fromFlatArray(fields) : null });
    }
  }
  return ok(entries);
}

export function decodePendingEntries(reply: unknown): StreamResult<PendingEntry[]> {
  const decoded = decode(pendingRangeSchema, reply, 'XPENDING');
  if (!decoded.ok) return decoded;

  return ok(
    decoded.value.map(([id, owner, idleMs, deliveryCount]) => ({ id, owner, idleMs, deliveryCount }))
  );
}

export function decodeClaimReply(reply: unknown): StreamResult<RawEntry[]> {
  const decoded = decode(claimReplySchema, reply, 'XCLAIM');
  if (!decoded.ok) return decoded;

  const entries: RawEntry[] = [];
  for (const item of decoded.value) {
    if (!item) continue;
    const [id, fields] = item;
    entries.push({ id, fields: fields ? fromFlatArray(fields) : null });
  }
  return ok(entries);
}

export function decodeCount(reply: unknown, command: string): StreamResult<number> {
  return decode(countSchema, reply, command);
}

/**
 * Decode the flat key/value reply of XINFO STREAM
 */
export function decodeStreamInfo(reply: unknown): StreamResult<StreamInfo> {
  const flat = decode(flatRecordSchema, reply, 'XINFO STREAM');
  if (!flat.ok) return flat;

  const record = flat.value;
  const length = decode(countSchema, record['length'], 'XINFO STREAM length');
  if (!length.ok) return length;
  const groups = decode(countSchema, record['groups'], 'XINFO STREAM groups');
  if (!groups.ok) return groups;
  const lastGeneratedId = decode(idSchema, record['last-generated-id'], 'XINFO STREAM last-generated-id');
  if (!lastGeneratedId.ok) return lastGeneratedId;
  const firstEntry = decode(infoEntrySchema, record['first-entry'] ?? null, 'XINFO STREAM first-entry');
  if (!firstEntry.ok) return firstEntry;
  const lastEntry = decode(infoEntrySchema, record['last-entry'] ?? null, 'XINFO STREAM last-entry');
  if (!lastEntry.ok) return lastEntry;

  return ok({
    length: length.value,
    groups: groups.value,
    lastGeneratedId: lastGeneratedId.value,
    firstEntryId: firstEntry.value ? firstEntry.value[0] : null,
    lastEntryId: lastEntry.value ? lastEntry.value[0] : null,
  });
}

export function decodeGroupsInfo(reply: unknown): StreamResult<GroupInfo[]> {
  return decode(z.array(groupInfoSchema), reply, 'XINFO GROUPS');
}

export function decodeConsumersInfo(reply: unknown): StreamResult<ConsumerInfo[]> {
  return decode(z.array(consumerInfoSchema), reply, 'XINFO CONSUMERS');
}
