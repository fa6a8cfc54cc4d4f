import type { Registry } from 'prom-client';
import type { AppConfig } from './config/types.js';
import { createRegistry } from './metrics/registry.js';
import { SenderMetrics } from './metrics/sender.js';
import { ReceiverMetrics } from './metrics/receiver.js';
import { RequestGenerator, GeneratorOptions } from './generator/generator.js';
import { OutageState } from './outage/state.js';
import { OutageController } from './outage/controller.js';
import { FaultInjectionPipeline } from './faults/pipeline.js';
import { createInboxHandler } from './handlers/inbox.js';
import { Server } from './server/server.js';
import { logger } from './observability/logger.js';

export interface RunOptions {
  register?: Registry;
  onListening?: (server: Server) => void;
  generator?: GeneratorOptions;
}

/** Child signal that also aborts when a sibling task fails. */
function linkedController(signal: AbortSignal): AbortController {
  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort();
  } else {
    signal.addEventListener('abort', () => controller.abort(), { once: true });
  }
  return controller;
}

async function runAll(controller: AbortController, tasks: Promise<unknown>[]): Promise<void> {
  try {
    await Promise.all(tasks);
  } catch (error) {
    controller.abort();
    throw error;
  }
}

/** Sender: observability server plus the request generator. */
export async function runSender(config: AppConfig, signal: AbortSignal, options: RunOptions = {}): Promise<void> {
  const register = options.register ?? createRegistry({ collectDefaultMetrics: true });
  const metrics = new SenderMetrics(register);
  const local = linkedController(signal);

  const server = new Server({ port: config.senderPort, shutdownGraceMs: config.shutdownGraceMs });
  server.registerCommonRoutes(register);

  const generator = new RequestGenerator(config.sender, metrics, options.generator);

  await runAll(local, [
    server.start(local.signal, () => options.onListening?.(server)),
    generator.run(local.signal),
  ]);
}

/** Receiver: /inbox behind the fault pipeline, with the outage schedule running beside it. */
export async function runReceiver(config: AppConfig, signal: AbortSignal, options: RunOptions = {}): Promise<void> {
  const register = options.register ?? createRegistry({ collectDefaultMetrics: true });
  const metrics = new ReceiverMetrics(register);
  const local = linkedController(signal);

  const outage = new OutageState();
  metrics.setOutageState(outage.isActive());
  outage.onTransition((transition) => {
    metrics.setOutageState(transition.to === 'OUTAGE');
  });

  const controller = new OutageController(config.receiver, outage);
  const pipeline = new FaultInjectionPipeline(config.receiver, outage, metrics, { signal: local.signal });

  const server = new Server({ port: config.receiverPort, shutdownGraceMs: config.shutdownGraceMs });
  server.registerCommonRoutes(register);
  server.registerHandler('post', '/inbox', createInboxHandler(pipeline));

  logger.info('receiver_config', 'Fault injection configured', {
    responseDelayMs: config.receiver.responseDelayMs,
    responseJitterMs: config.receiver.responseJitterMs,
    hangRate: config.receiver.hangRate,
    errorRate: config.receiver.errorRate,
    outageEnabled: controller.isEnabled(),
  });

  await runAll(local, [
    server.start(local.signal, () => options.onListening?.(server)),
    controller.run(local.signal),
  ]);
}

export function run(config: AppConfig, signal: AbortSignal, options: RunOptions = {}): Promise<void> {
  return config.mode === 'sender'
    ? runSender(config, signal, options)
    : runReceiver(config, signal, options);
}
