import 'dotenv/config';
import { closePool } from '@orderflow/shared/src/db/client';
import {
     closeConnection,
     getChannel,
     ORDER_LIFECYCLE_QUEUE,
} from '@orderflow/shared/src/messaging/client';
import { OrderService } from '@orderflow/shared/src/services/order-service';
import { createChildLogger } from '@orderflow/shared/src/utils/logger';
import { processMessage } from './consumer';
import { OrderEventHandlers } from './handlers';

const PREFETCH = parseInt(process.env.AMQP_PREFETCH || '10', 10);

const log = createChildLogger({ component: 'order-events-worker' });

class OrderEventsWorker {
     private readonly handlers = new OrderEventHandlers(new OrderService(), log);

     async start(): Promise<void> {
          log.info({ prefetch: PREFETCH }, 'Starting order events worker');

          const channel = await getChannel();
          await channel.prefetch(PREFETCH);

          await channel.consume(ORDER_LIFECYCLE_QUEUE, (msg) => {
               if (!msg) return;
               processMessage(channel, msg, this.handlers, log).catch((err: unknown) =>
                    log.error({ err }, 'Unhandled error while processing message')
               );
          });

          log.info({ queue: ORDER_LIFECYCLE_QUEUE }, 'Order events worker started');
     }
}

async function shutdown(): Promise<void> {
     log.info('Shutting down gracefully...');
     await closeConnection();
     await closePool();
}

async function main(): Promise<void> {
     const worker = new OrderEventsWorker();

     const onSignal = (): void => {
          shutdown()
               .catch((err: unknown) => log.error({ err }, 'Error during shutdown'))
               .finally(() => process.exit(0));
     };
     process.on('SIGINT', onSignal);
     process.on('SIGTERM', onSignal);

     await worker.start();
}

main().catch((err: unknown) => {
     log.error({ err }, 'Fatal error in order events worker');
     process.exit(1);
});
