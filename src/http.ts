import http from "node:http";
import type { Store } from "./db/index.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { PipelineScheduler } from "./pipeline/scheduler.js";

export interface HttpDeps {
  scheduler: Pick<PipelineScheduler, "trigger" | "isRunning">;
  store: Pick<Store, "getStats">;
  cronSecret?: string;
  logger?: Logger;
}

/** Without a configured secret every caller is allowed. */
export function verifyCronSecret(authorization: string | undefined, cronSecret?: string): boolean {
  if (!cronSecret) {
    return true;
  }
  return authorization === `Bearer ${cronSecret}`;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function createHttpServer(deps: HttpDeps): http.Server {
  const logger = deps.logger ?? consoleLogger;

  async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health" && req.method === "GET") {
      const stats = await deps.store.getStats();
      sendJson(res, 200, { status: "ok", running: deps.scheduler.isRunning(), stats });
      return;
    }

    if (url.pathname === "/run") {
      if (req.method !== "POST") {
        sendJson(res, 405, { error: "Method not allowed" });
        return;
      }
      if (!verifyCronSecret(req.headers.authorization, deps.cronSecret)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }

      logger.log("Pipeline run triggered over HTTP");
      const report = await deps.scheduler.trigger();
      if (!report) {
        sendJson(res, 409, { error: "A pipeline run is already in progress" });
        return;
      }

      sendJson(res, 200, {
        success: true,
        processed: report.processed,
        splitDone: report.splitDone,
        enrichedSingle: report.enrichedSingle,
        failed: report.failed,
        stories: report.stories,
        costEstimate: report.costEstimate,
      });
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error("Request error:", error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });
}
