import "dotenv/config";
import path from "path";
import brokerService from "./services/broker.service";
import transferService from "./services/transfer.service";
import type { UploadOptions } from "./services/transfer.service";
import { humanBytes, renderProgress } from "./utils/format";
import logger from "./utils/logger";

const USAGE = `Usage:
  upload <file>                  stream a file to the server
  download <objectId> [dest]     download an object and verify its checksum
  list [prefix]                  list stored objects
  delete <objectId>              delete an object`;

const cancellation = new AbortController();

function printProgress(line: string): void {
  if (process.stdout.isTTY) {
    process.stdout.write(`\r${line}`);
  }
}

async function upload(filePath: string): Promise<void> {
  const options: UploadOptions = { signal: cancellation.signal };

  if (brokerService.enabled) {
    await brokerService.connect();
    options.progress = {
      source: brokerService,
      callback: (snapshot) => printProgress(renderProgress(snapshot)),
    };
  } else {
    options.onBytesSent = (bytes) => printProgress(`${humanBytes(bytes)} sent`);
  }

  try {
    const summary = await transferService.upload(path.resolve(filePath), options);
    printProgress("\n");
    logger.info(`Uploaded ${summary.metadata.fileName} as ${summary.objectId}`, {
      size: humanBytes(summary.size),
      sha256: summary.sha256,
      attempts: summary.attempts,
      backup: summary.metadata.backupLocation ?? "none",
    });
  } finally {
    await brokerService.disconnect();
  }
}

async function download(objectId: string, destination?: string): Promise<void> {
  const target = path.resolve(destination ?? objectId);
  const summary = await transferService.download(objectId, target, cancellation.signal);
  if (!summary.verified) {
    logger.warn("Server sent no checksum, download not verified");
  }
}

async function list(prefix?: string): Promise<void> {
  const objects = await transferService.list(prefix);
  for (const object of objects) {
    process.stdout.write(
      `${object.objectId}  ${humanBytes(object.size).padStart(10)}  ${object.contentType}  ${object.fileName}\n`,
    );
  }
  logger.info(`${objects.length} object(s)`);
}

async function run(argv: string[]): Promise<void> {
  const [command, ...args] = argv;

  switch (command) {
    case "upload":
      if (!args[0]) break;
      return upload(args[0]);
    case "download":
      if (!args[0]) break;
      return download(args[0], args[1]);
    case "list":
      return list(args[0]);
    case "delete":
      if (!args[0]) break;
      return transferService.remove(args[0]);
  }

  process.stderr.write(`${USAGE}\n`);
  process.exitCode = 2;
}

// Graceful shutdown
process.once("SIGINT", () => {
  logger.info("SIGINT received, cancelling...");
  cancellation.abort();
});

run(process.argv.slice(2)).catch((error) => {
  logger.error("Command failed:", error);
  process.exitCode = 1;
});
