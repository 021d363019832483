import type { StreamCommands } from '../core/redis';
import { attempt, EmptyReplyError, ok, fail, type StreamResult } from '../core/errors';
import { decodePendingEntries } from '../core/codecs';
import { nowMs } from '../core/time';
import type { StreamId } from './identifier';
import type { GroupIdentity, OwnershipOutcome, PendingEntry } from './types';

/**
 * Fetch the pending entry for a single id, or null when nobody holds it
 */
export async function lookupPendingEntry(
  redis: StreamCommands,
  streamName: string,
  groupName: string,
  id: StreamId
): Promise<StreamResult<PendingEntry | null>> {
  const key = id.toString();
  const reply = await attempt('XPENDING', () => redis.xpending(streamName, groupName, key, key, 1));
  if (!reply.ok) return reply;

  const entries = decodePendingEntries(reply.value);
  if (!entries.ok) return entries;

  const [entry] = entries.value;
  if (!entry) {
    return ok(null);
  }
  if (entries.value.length > 1 || !entry.id.equals(id)) {
    return fail(
      new EmptyReplyError(
        `XPENDING lookup for ${key} answered with ${entries.value.length} entries starting at ${entry.id}`
      )
    );
  }
  return ok(entry);
}

/**
 * Compare the current holder of `id` with the caller's consumer name.
 * The answer can change right after it is returned; a claim from another
 * consumer is not prevented, only observed.
 */
export async function checkOwnership(
  redis: StreamCommands,
  identity: GroupIdentity,
  id: StreamId
): Promise<StreamResult<OwnershipOutcome>> {
  const lookup = await lookupPendingEntry(redis, identity.streamName, identity.groupName, id);
  if (!lookup.ok) return lookup;

  const entry = lookup.value;
  return ok({
    id,
    currentOwner: entry ? entry.owner : null,
    idleMs: entry ? entry.idleMs : null,
    deliveryCount: entry ? entry.deliveryCount : null,
    belongsToCaller: entry !== null && entry.owner === identity.consumerName,
    observedAt: nowMs(),
  });
}
