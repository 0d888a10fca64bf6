import express, { Request, Response, NextFunction } from "express";
import { Server } from "http";
import type { AppStatus, MatchData, StoredMatch } from "../types";
import { createLogger } from "../utils/logger";

/** What the API reads from; implemented by the application shell. */
export interface MatchStatusProvider {
  getStatus(): AppStatus;
  getMatchList(): StoredMatch[];
  getMatchData(matchId: string): MatchData;
}

const log = createLogger("API");

export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;
  private provider: MatchStatusProvider;
  private port: number;
  private apiKey: string;

  constructor(provider: MatchStatusProvider, port: number = 5000, apiKey: string = "") {
    this.provider = provider;
    this.port = port;
    this.apiKey = apiKey;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      log.debug(`${req.method} ${req.path}`);
      next();
    });

    // API key authentication (if configured)
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (!this.apiKey) {
        return next();
      }

      const providedKey = req.headers["x-api-key"];
      if (providedKey !== this.apiKey) {
        log.warn(`Unauthorized request from ${req.ip}`);
        res.status(401).json({ status: "error", error: "Unauthorized" });
        return;
      }
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get("/", (_req: Request, res: Response) => {
      res.send("live match tracker");
    });

    this.app.get("/api/health", (_req: Request, res: Response) => {
      res.json({ status: "success", data: { healthy: true }, timestamp: new Date().toISOString() });
    });

    this.app.get("/api/status", (_req: Request, res: Response) => {
      try {
        const status = this.provider.getStatus();
        res.json({ status: "success", data: status, timestamp: status.timestamp });
      } catch (error) {
        log.error("Error getting status", error);
        res.status(500).json({ status: "error", error: "Internal server error" });
      }
    });

    this.app.get("/api/matches", (_req: Request, res: Response) => {
      try {
        res.json({ status: "success", data: this.provider.getMatchList() });
      } catch (error) {
        log.error("Error getting match list", error);
        res.status(500).json({ status: "error", error: "Internal server error" });
      }
    });

    this.app.get("/api/matches/:id", (req: Request, res: Response) => {
      try {
        const matchId = req.params.id;
        const match = this.provider.getMatchList().find((m) => m.id === matchId);
        if (!match) {
          res.status(404).json({ status: "error", error: `Match ${matchId} not found` });
          return;
        }
        res.json({ status: "success", data: { match, ...this.provider.getMatchData(matchId) } });
      } catch (error) {
        log.error("Error getting match data", error);
        res.status(500).json({ status: "error", error: "Internal server error" });
      }
    });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        log.info(`API server listening on port ${this.getPort()}`);
        if (this.apiKey) {
          log.info("API key authentication enabled");
        } else {
          log.warn("API key authentication disabled (no API_KEY configured)");
        }
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  /** Bound port (differs from the configured one when that was 0). */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.port;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    log.info("API server stopped");
  }
}
