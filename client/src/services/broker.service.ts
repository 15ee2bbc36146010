import { createClient, RedisClientType } from "redis";
import { loadClientConfig } from "../config";
import type { ProgressSnapshot } from "../models/transfer.model";
import logger from "../utils/logger";

export type ProgressCallback = (snapshot: ProgressSnapshot) => void;

/** Something that can push progress for a session until told to stop. */
export interface ProgressSource {
  watch(sessionId: string, callback: ProgressCallback): Promise<() => Promise<void>>;
}

function isProgressSnapshot(value: unknown): value is ProgressSnapshot {
  return (
    typeof value === "object" &&
    value !== null &&
    "sessionId" in value &&
    typeof value.sessionId === "string" &&
    "state" in value &&
    typeof value.state === "string" &&
    "bytesTransferred" in value &&
    typeof value.bytesTransferred === "number"
  );
}

/** Progress snapshot carried by a pub/sub message, or null if it is not one. */
export function parseProgressMessage(message: string): ProgressSnapshot | null {
  try {
    const value: unknown = JSON.parse(message);
    return isProgressSnapshot(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Subscribes to the server's progress channel over Redis. Without
 * REDIS_URL the client has no push progress.
 */
class BrokerService implements ProgressSource {
  private subscriber?: RedisClientType;
  private isConnected: boolean = false;
  private readonly channel: string;

  constructor() {
    const config = loadClientConfig();
    this.channel = config.progressChannel;

    if (config.redisUrl) {
      this.subscriber = createClient({ url: config.redisUrl });
      this.subscriber.on("error", (err) => logger.error("Redis Subscriber Error:", err));
    }
  }

  get enabled(): boolean {
    return this.subscriber !== undefined;
  }

  async connect(): Promise<void> {
    if (!this.subscriber) {
      return;
    }
    try {
      await this.subscriber.connect();
      this.isConnected = true;
      logger.debug("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      return;
    }
    try {
      await this.subscriber.quit();
      this.isConnected = false;
      logger.debug("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async watch(sessionId: string, callback: ProgressCallback): Promise<() => Promise<void>> {
    const subscriber = this.subscriber;
    if (!subscriber || !this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    const listener = (message: string) => {
      const snapshot = parseProgressMessage(message);
      if (snapshot && snapshot.sessionId === sessionId) {
        callback(snapshot);
      }
    };

    try {
      await subscriber.subscribe(this.channel, listener);
      logger.debug(`Watching ${this.channel} for session ${sessionId}`);
    } catch (error) {
      logger.error("Error subscribing to progress:", error);
      throw error;
    }

    return async () => {
      await subscriber.unsubscribe(this.channel, listener);
    };
  }
}

export default new BrokerService();
