/**
 * Reply and record types for stream producers and consumers
 */

import type { StreamError } from '../core/errors';
import type { StreamId } from './identifier';

/** Phase of `consume()` a message came from, in priority order */
export type ConsumePhase = 'new' | 'pending' | 'claimed';

export interface StreamMessage {
  id: StreamId;
  fields: ReadonlyMap<string, string>;
  source: ConsumePhase;
  /** 1 for new reads, post-claim count for claims; null when the reply does not carry it */
  deliveryCount: number | null;
}

export interface ConsumeBatch {
  messages: StreamMessage[];
}

/**
 * A failed consume still hands back what earlier phases fetched.
 */
export type ConsumeResult =
  | { ok: true; value: ConsumeBatch }
  | { ok: false; error: StreamError; partial: ConsumeBatch };

/**
 * A pipeline is not atomic, so a failed batch reports what the server did
 * append. `partial` lines up with the input; null where no id came back.
 */
export type AppendBatchResult =
  | { ok: true; value: StreamId[] }
  | { ok: false; error: StreamError; partial: Array<StreamId | null> };

export interface GroupIdentity {
  streamName: string;
  groupName: string;
  consumerName: string;
}

/** A delivered-but-unacknowledged entry in a group's pending list */
export interface PendingEntry {
  id: StreamId;
  owner: string;
  idleMs: number;
  deliveryCount: number;
}

/**
 * Point-in-time view of who holds a message; stale as soon as it is returned.
 */
export interface OwnershipOutcome {
  id: StreamId;
  currentOwner: string | null;
  idleMs: number | null;
  deliveryCount: number | null;
  belongsToCaller: boolean;
  observedAt: number;
}

export interface AckReply {
  id: StreamId;
  acked: boolean;
}

export interface StreamInfo {
  length: number;
  groups: number;
  lastGeneratedId: StreamId;
  firstEntryId: StreamId | null;
  lastEntryId: StreamId | null;
}

/** One entry of XINFO GROUPS; `entriesRead` and `lag` are null when the server does not know them */
export interface GroupInfo {
  name: string;
  consumers: number;
  pending: number;
  lastDeliveredId: StreamId;
  entriesRead: number | null;
  lag: number | null;
}

export interface ConsumerInfo {
  name: string;
  pending: number;
  /** since the consumer last tried to read or claim */
  idleMs: number;
  /** since its last successful read or claim; null when it never had one or the server is older */
  inactiveMs: number | null;
}
