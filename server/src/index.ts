import "dotenv/config";
import express from "express";
import cors from "cors";
import { loadConfig } from "./config";
import storageService from "./services/storage.service";
import brokerService from "./services/broker.service";
import transferService from "./services/transfer.service";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import * as transferController from "./controllers/transfer.controller";
import * as objectController from "./controllers/object.controller";
import logger from "./utils/logger";

const config = loadConfig();
const authMiddleware = createAuthMiddleware(config.server.apiKey);

const app = express();

// Middleware. No body parser: upload bodies are streamed straight into the engine.
app.use(cors({ exposedHeaders: ["Content-Range", "Accept-Ranges", "X-Checksum-Sha256"] }));

// Public routes
app.get("/health", transferController.healthCheck);

// Protected routes
app.post("/uploads", authMiddleware, transferController.upload);
app.get("/sessions/:sessionId/progress", authMiddleware, transferController.getProgress);
app.delete("/sessions/:sessionId", authMiddleware, transferController.cancelSession);

app.get("/objects", authMiddleware, objectController.listObjects);
app.delete("/objects/:objectId", authMiddleware, objectController.deleteObject);
app.get("/objects/:objectId/stream", authMiddleware, objectController.streamObject);
app.get("/objects/:objectId/download", authMiddleware, objectController.downloadObject);
app.get("/objects/:objectId/link", authMiddleware, objectController.getLink);

async function startServer() {
  try {
    // Initialize services
    logger.info("Initializing services...");

    await storageService.ensureBuckets();
    await brokerService.connect();
    transferService.start();

    const server = app.listen(config.server.port, "0.0.0.0", () => {
      logger.info(`Server listening on port ${config.server.port}`);
      logger.info("Server ready to accept requests");
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close();
      try {
        await transferService.shutdown();
        await brokerService.disconnect();
        process.exit(0);
      } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      }
    };
    process.once("SIGTERM", () => void shutdown("SIGTERM"));
    process.once("SIGINT", () => void shutdown("SIGINT"));
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}

void startServer();
