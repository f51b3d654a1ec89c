import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const ORDERFLOW_EVENTS_EXCHANGE = 'orderflow.events';
export const ORDERFLOW_DEAD_LETTER_EXCHANGE = 'dlx.orderflow';
export const ORDER_LIFECYCLE_QUEUE = 'orderflow.order-lifecycle';
export const ORDER_LIFECYCLE_DLQ = 'dlq.orderflow.order-lifecycle';

const isTest = process.env.NODE_ENV === 'test';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, attempting to reconnect...');
          setTimeout(() => {
               connection = null;
               channel = null;
          }, 5000);
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

async function setupTopology(ch: Channel): Promise<void> {
     await ch.assertExchange(ORDERFLOW_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(ORDERFLOW_DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(ORDER_LIFECYCLE_QUEUE, {
          durable: true,
          deadLetterExchange: ORDERFLOW_DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: ORDER_LIFECYCLE_DLQ,
     });
     await ch.assertQueue(ORDER_LIFECYCLE_DLQ, { durable: true });

     await ch.bindQueue(ORDER_LIFECYCLE_QUEUE, ORDERFLOW_EVENTS_EXCHANGE, 'order.*');
     await ch.bindQueue(ORDER_LIFECYCLE_DLQ, ORDERFLOW_DEAD_LETTER_EXCHANGE, ORDER_LIFECYCLE_DLQ);
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();
     await setupTopology(ch);
     channel = ch;

     logger.info('RabbitMQ channel created and configured');

     return ch;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: object,
     options: amqplib.Options.Publish = {}
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     const accepted = ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          ...options,
     });

     if (!accepted) {
          logger.warn({ exchange, routingKey }, 'RabbitMQ write buffer full, message queued locally');
     }
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}

// Handle shutdown signals (disabled in test mode)
if (!isTest) {
     const shutdown = (): void => {
          closeConnection().catch((err: unknown) =>
               logger.error({ err }, 'Failed to close RabbitMQ connection')
          );
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

export type { Channel, ConsumeMessage };
