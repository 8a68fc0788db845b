import type { Request, Response } from "express";
import { errorMessage } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import type { StockRepository } from "../../lib/stocks/repository.js";

/**
 * Health Check
 */
export function createHealthHandler(repository: StockRepository, logger: Logger) {
  return async function healthHandler(_req: Request, res: Response): Promise<void> {
    try {
      await repository.ping();
      res.status(200).json({
        status: "healthy",
        timestamp: new Date().toISOString(),
        database: "connected",
      });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Health check failed: ${message}`);
      res.status(503).json({
        status: "unhealthy",
        timestamp: new Date().toISOString(),
        database: "disconnected",
        error: message,
      });
    }
  };
}
