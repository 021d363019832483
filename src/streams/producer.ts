import type { PipelineCommand, StreamCommands } from '../core/redis';
import {
  attempt,
  InvalidArgumentError,
  ok,
  fail,
  toStreamError,
  type StreamError,
  type StreamResult,
} from '../core/errors';
import { decodeAddedId, entriesOf, toFlatArray, type FieldInput } from '../core/codecs';
import { Logger } from '../core/logger';
import { parseProducerConfig, type ProducerConfig } from './policies';
import type { StreamId } from './identifier';
import type { AppendBatchResult } from './types';

function validateFields(fields: FieldInput): StreamResult<string[]> {
  const entries = entriesOf(fields);
  if (entries.length === 0) {
    return fail(new InvalidArgumentError('Message must have at least one field'));
  }
  if (entries.some(([key]) => key.length === 0)) {
    return fail(new InvalidArgumentError('Message field names must not be empty'));
  }
  return ok(toFlatArray(entries));
}

export class Producer {
  private constructor(
    private redis: StreamCommands,
    readonly config: ProducerConfig,
    private logger: Logger
  ) {}

  static create(
    redis: StreamCommands,
    config: ProducerConfig,
    logger: Logger = new Logger('producer')
  ): StreamResult<Producer> {
    const parsed = parseProducerConfig(config);
    if (!parsed.ok) return parsed;

    return ok(new Producer(redis, parsed.value, logger.child({ stream: parsed.value.streamName })));
  }

  /**
   * Append one message; the server assigns its id
   */
  async append(fields: FieldInput): Promise<StreamResult<StreamId>> {
    const flat = validateFields(fields);
    if (!flat.ok) return flat;

    const reply = await attempt('XADD', () => this.redis.xadd(...this.addArgs(flat.value)));
    if (!reply.ok) {
      this.logger.error(`Append failed: ${reply.error.message}`);
      return reply;
    }

    const id = decodeAddedId(reply.value);
    if (id.ok) {
      this.logger.debug(`Appended ${id.value}`);
    }
    return id;
  }

  /**
   * Append several messages in one pipeline; ids come back in input order.
   * Commands after a failed one still run, so on failure check `partial`
   * before retrying to avoid appending a message twice.
   */
  async appendBatch(messages: readonly FieldInput[]): Promise<AppendBatchResult> {
    const none = (): Array<StreamId | null> => messages.map(() => null);

    const commands: PipelineCommand[] = [];
    for (const [index, fields] of messages.entries()) {
      const flat = validateFields(fields);
      if (!flat.ok) {
        return { ok: false, error: new InvalidArgumentError(`Message ${index}: ${flat.error.message}`), partial: none() };
      }
      commands.push(['XADD', ...this.addArgs(flat.value)]);
    }

    if (commands.length === 0) {
      return { ok: true, value: [] };
    }

    const reply = await attempt('XADD pipeline', () => this.redis.pipeline(commands));
    if (!reply.ok) {
      this.logger.error(`Batch append failed: ${reply.error.message}`);
      return { ok: false, error: reply.error, partial: none() };
    }

    const partial: Array<StreamId | null> = [];
    let firstError: StreamError | null = null;
    for (const [err, value] of reply.value) {
      const id = err ? fail(toStreamError(err, 'XADD')) : decodeAddedId(value);
      if (id.ok) {
        partial.push(id.value);
      } else {
        partial.push(null);
        if (!firstError) firstError = id.error;
      }
    }

    if (firstError) {
      const appended = partial.filter((id) => id !== null).length;
      this.logger.error(`Batch append failed, ${appended} of ${messages.length} appended: ${firstError.message}`);
      return { ok: false, error: firstError, partial };
    }

    const ids = partial.filter((id): id is StreamId => id !== null);
    this.logger.debug(`Appended ${ids.length} messages`);
    return { ok: true, value: ids };
  }

  private addArgs(flat: string[]): [string, ...string[]] {
    const { streamName, maxLen } = this.config;
    if (maxLen === null) {
      return [streamName, '*', ...flat];
    }
    return [streamName, 'MAXLEN', '~', maxLen.toString(), '*', ...flat];
  }
}
