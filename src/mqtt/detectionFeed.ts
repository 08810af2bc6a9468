import logger, { type LogSink } from '../logger.js';
import type { InteractionEngine, IngestResult } from '../interactions/engine.js';
import type { BusClient } from './client.js';

export type DetectionTopic = {
  context: string;
  objectId: string;
};

export interface DetectionFeedOptions {
  client: Pick<BusClient, 'prefix' | 'subscribe'>;
  engine: Pick<InteractionEngine, 'ingest'>;
  detectionsTopic: string;
  log?: LogSink;
}

/**
 * Routes `{prefix}/{detections}/{context}/{objectId}` messages into the engine. The
 * context is the first level after the detections topic; everything after it is the
 * object id.
 */
export class DetectionFeed {
  private readonly client: DetectionFeedOptions['client'];
  private readonly engine: DetectionFeedOptions['engine'];
  private readonly detectionsTopic: string;
  private readonly log: LogSink;

  constructor(options: DetectionFeedOptions) {
    this.client = options.client;
    this.engine = options.engine;
    this.detectionsTopic = options.detectionsTopic;
    this.log = options.log ?? logger;
  }

  async start() {
    await this.client.subscribe(`${this.detectionsTopic}/#`, (topic, payload) => {
      this.handleMessage(topic, payload);
    });
  }

  parseTopic(topic: string): DetectionTopic | null {
    const base = `${this.client.prefix}/${this.detectionsTopic}/`;
    if (!topic.startsWith(base)) {
      return null;
    }
    const rest = topic.slice(base.length);
    const separator = rest.indexOf('/');
    if (separator <= 0 || separator === rest.length - 1) {
      return null;
    }
    return { context: rest.slice(0, separator), objectId: rest.slice(separator + 1) };
  }

  handleMessage(topic: string, payload: Uint8Array | string): IngestResult | null {
    const parsed = this.parseTopic(topic);
    if (!parsed) {
      this.log.debug({ topic }, 'Ignoring message on unrecognized detection topic');
      return null;
    }

    try {
      return this.engine.ingest(parsed.context, parsed.objectId, payload);
    } catch (error) {
      this.log.error(
        { err: error, topic, context: parsed.context },
        'Failed to apply detection update'
      );
      return null;
    }
  }
}

export default DetectionFeed;
