import type { Channel, ConsumeMessage } from '@orderflow/shared/src/messaging/client';
import { ConcurrencyConflictError } from '@orderflow/shared/src/utils/errors';
import type { Logger } from '@orderflow/shared/src/utils/logger';
import { parseEnvelope, type OrderEventHandlers } from './handlers';

type AckChannel = Pick<Channel, 'ack' | 'nack'>;

/**
 * Ack on success. A concurrency conflict goes back on the queue so the retry
 * sees fresh state; every other failure is dead-lettered.
 */
export async function processMessage(
     channel: AckChannel,
     msg: ConsumeMessage,
     handlers: OrderEventHandlers,
     log: Logger
): Promise<void> {
     try {
          const envelope = parseEnvelope(msg.content);
          const outcome = await handlers.handle(envelope);
          channel.ack(msg);
          log.debug({ eventId: envelope.eventId, outcome }, 'Message acknowledged');
     } catch (error) {
          if (error instanceof ConcurrencyConflictError) {
               log.warn({ err: error }, 'Concurrency conflict, requeueing');
               channel.nack(msg, false, true);
          } else {
               log.error({ err: error }, 'Failed to process message, sending to DLQ');
               channel.nack(msg, false, false);
          }
     }
}
