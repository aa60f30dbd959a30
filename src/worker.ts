import { randomBytes, randomInt } from 'node:crypto';
import pino from 'pino';
import { z } from 'zod';
import { defineEvent } from './application/typed-events.js';
import { sleep } from './application/timing.js';
import { loadBusConfig } from './config.js';
import { createBus } from './create-bus.js';

/**
 * Demo process: a simulated click stream and a consumer that logs it.
 *
 * The consumer starts two seconds after the producer so a backlog builds
 * up first; the broker holds it until the channel drains it. Configure
 * the broker through BUS_* variables (BUS_FAMILY=memory runs without one).
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const clickEvent = defineEvent(
  'click',
  z.object({
    user_id: z.number().int().min(0),
    clicked_on: z.string().min(1),
  }),
);

const CHANNEL = 'some_channel';

const bus = createBus(loadBusConfig(process.env), { log });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function simulateClicks(signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    await sleep(randomInt(300, 1200), signal);
    const count = randomInt(1, 4);
    for (let i = 0; i < count && !signal.aborted; i++) {
      const click = { user_id: randomInt(0, 1000), clicked_on: randomBytes(8).toString('hex') };
      const result = await bus.emit(clickEvent, click);
      if (result.ok) {
        log.info(click, 'PRODUCE');
      } else {
        log.warn({ err: result.error, reason: result.error.reason }, 'Click not published');
      }
    }
  }
}

async function main(): Promise<void> {
  const producing = simulateClicks(ac.signal);

  await sleep(2000, ac.signal);
  if (!ac.signal.aborted) {
    bus.on(clickEvent, CHANNEL, (click, delivery) => {
      log.info({ ...click, attempts: delivery.attempts }, 'CONSUME');
    });
  }

  await producing;
  await bus.close();
  log.info('Worker stopped');
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
