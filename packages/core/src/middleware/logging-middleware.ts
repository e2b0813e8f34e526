import type { Middleware } from "../models/handlers";
import type ClientPipeline from "../client/client-pipeline";
import { createLogger, type Logger } from "../utils/logger";

const STARTED_AT = "logging:startedAt";

/**
 * Logs each request when it is sent, each response when it arrives, and
 * each call that failed.
 */
export function loggingMiddleware(
  logger: Logger = createLogger("client:http")
): Middleware<ClientPipeline> {
  return (pipeline) => {
    pipeline
      .peek((call) => {
        call.extras.set(STARTED_AT, Date.now());
        logger.info("sending request", {
          method: call.request.method,
          url: call.request.url,
        });
      })
      .received((call) => {
        const startedAt = call.extras.get(STARTED_AT);
        logger.info("response received", {
          method: call.request.method,
          url: call.request.url,
          status: call.response?.status,
          engine: call.engine,
          duration_ms: typeof startedAt === "number" ? Date.now() - startedAt : undefined,
        });
      })
      .catcher((error) => {
        logger.error("request failed", {
          method: pipeline.request.method,
          url: pipeline.request.url,
          error,
        });
      });
  };
}
