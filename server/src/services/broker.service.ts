import { createClient } from "redis";
import type { RedisClientType } from "redis";
import { loadConfig } from "../config";
import type { ProgressSnapshot, TransferEvent } from "../models/transfer.model";
import logger from "../utils/logger";

/**
 * Pushes progress snapshots and transfer events over Redis pub/sub.
 * Without REDIS_URL every publish is a no-op.
 */
class BrokerService {
  private publisher?: RedisClientType;
  private isConnected: boolean = false;
  private readonly progressChannel: string;
  private readonly eventsChannel: string;

  constructor() {
    const { redis } = loadConfig();
    this.progressChannel = redis.progressChannel;
    this.eventsChannel = redis.eventsChannel;

    if (redis.url) {
      this.publisher = createClient({ url: redis.url });
      this.publisher.on("error", (err) => logger.error("Redis Publisher Error:", err));
    }
  }

  get enabled(): boolean {
    return this.publisher !== undefined;
  }

  async connect(): Promise<void> {
    if (!this.publisher) {
      logger.info("REDIS_URL not set, progress push disabled");
      return;
    }
    try {
      await this.publisher.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      return;
    }
    try {
      await this.publisher.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async publishProgress(snapshot: ProgressSnapshot): Promise<void> {
    await this.publish(this.progressChannel, snapshot, { sessionId: snapshot.sessionId });
  }

  async publishEvent(event: TransferEvent): Promise<void> {
    const published = await this.publish(this.eventsChannel, event, {
      event: event.event,
      sessionId: event.sessionId,
    });
    if (published) {
      logger.info(`Published ${event.event} to ${this.eventsChannel}`, {
        sessionId: event.sessionId,
        objectId: event.objectId,
      });
    }
  }

  private async publish(channel: string, payload: object, context: object): Promise<boolean> {
    if (!this.publisher || !this.isConnected) {
      return false;
    }
    try {
      await this.publisher.publish(channel, JSON.stringify(payload));
      logger.debug(`Published to ${channel}`, context);
      return true;
    } catch (error) {
      logger.error(`Error publishing to ${channel}:`, error);
      throw error;
    }
  }
}

export default new BrokerService();
