import { Client } from "minio";
import { S3Client } from "@aws-sdk/client-s3";
import { loadConfig } from "../config";
import type { AppConfig, PrimaryStoreConfig } from "../config";
import type { ObjectId } from "../models/transfer.model";
import { BackupChannelStore } from "../stores/backup-channel.store";
import { MinioChannel } from "../stores/minio-channel";
import { PrimaryObjectStore } from "../stores/primary-object.store";
import { AwsS3Gateway } from "../stores/s3-gateway";
import logger from "../utils/logger";

function createS3Client(config: PrimaryStoreConfig, endpoint?: string): S3Client {
  return new S3Client({
    region: config.region,
    ...(endpoint && { endpoint }),
    credentials: {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    },
    forcePathStyle: config.forcePathStyle,
  });
}

/**
 * Builds the primary and backup stores from configuration and owns the
 * clients behind them.
 */
class StorageService {
  readonly primary: PrimaryObjectStore;
  readonly backup?: BackupChannelStore;
  readonly backupMandatory: boolean;
  private readonly gateway: AwsS3Gateway;
  private readonly channel?: MinioChannel;
  private readonly presignedExpiresSec: number;

  constructor(config: AppConfig = loadConfig()) {
    const { primary, backup } = config;

    // Presigned URLs leave the network, so they may need a different host
    this.gateway = new AwsS3Gateway({
      client: createS3Client(primary, primary.endpoint),
      bucket: primary.bucket,
      presignClient: primary.publicEndpoint
        ? createS3Client(primary, primary.publicEndpoint)
        : undefined,
    });
    this.primary = new PrimaryObjectStore({
      gateway: this.gateway,
      keyPrefix: primary.keyPrefix,
    });

    if (backup.enabled) {
      this.channel = new MinioChannel({
        client: new Client({
          endPoint: backup.host,
          port: backup.port,
          useSSL: backup.useSSL,
          accessKey: backup.accessKey,
          secretKey: backup.secretKey,
        }),
        bucket: backup.bucket,
        region: primary.region,
      });
      this.backup = new BackupChannelStore({
        transport: this.channel,
        keyPrefix: backup.keyPrefix,
        name: "backup",
      });
    }
    this.backupMandatory = backup.enabled && backup.mandatory;
    this.presignedExpiresSec = config.presignedExpiresSec;

    logger.info(`StorageService initialized`, {
      primaryBucket: primary.bucket,
      primaryEndpoint: primary.endpoint ?? "aws",
      backup: backup.enabled ? `${backup.host}:${backup.port}/${backup.bucket}` : "disabled",
      backupMandatory: this.backupMandatory,
    });
  }

  async ensureBuckets(): Promise<void> {
    await this.gateway.ensureBucket();
    if (this.channel) {
      await this.channel.ensureBucket();
    }
  }

  async generatePresignedGetUrl(
    objectId: ObjectId,
    fileName?: string,
    expiresIn: number = this.presignedExpiresSec,
  ): Promise<string> {
    try {
      const url = await this.gateway.presignGet(this.primary.dataKey(objectId), expiresIn, fileName);
      logger.debug(`Generated presigned GET URL for ${objectId}, expires in ${expiresIn}s`);
      return url;
    } catch (error) {
      logger.error(`Error generating presigned GET URL for ${objectId}:`, error);
      throw error;
    }
  }

  get linkExpirySeconds(): number {
    return this.presignedExpiresSec;
  }
}

export default new StorageService();
