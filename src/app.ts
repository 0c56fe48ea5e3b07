import express from "express";
import cors from "cors";
import { createServer, type Server } from "http";
import type { AddressInfo } from "net";
import { config } from "./config";
import { createRoutes } from "./routes";
import { errorHandler, notFoundHandler, requestLogger } from "./middleware";
import type { ActivityRegistry } from "./services/activity.service";
import { SocketService } from "./services/socket.service";
import { ResponseHelper } from "./helpers/response.helper";

class App {
  public app: express.Application;
  public server: Server;
  public readonly socketService = new SocketService();
  private unsubscribeRoster: (() => void) | null = null;

  constructor(public readonly registry: ActivityRegistry) {
    this.app = express();
    this.server = createServer(this.app);
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
    this.initializeSocket();
  }

  private initializeMiddleware(): void {
    this.app.use(requestLogger);
    this.app.use(cors(config.cors));
  }

  private initializeRoutes(): void {
    this.app.use("/api", createRoutes(this.registry));
    this.app.use("/", createRoutes(this.registry));

    this.app.use(config.static.mountPath, express.static(config.static.dir));

    this.app.get("/", (req, res) => {
      ResponseHelper.redirect(res, config.static.indexPage, 307);
    });
  }

  private initializeErrorHandling(): void {
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  private initializeSocket(): void {
    this.socketService.initialize(this.server);
    this.unsubscribeRoster = this.registry.onChange((change) =>
      this.socketService.emitRosterUpdate(change)
    );
  }

  public listen(port: number = config.port): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, () => {
        this.server.off("error", reject);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Server is not listening on a TCP port"));
          return;
        }
        console.log(
          `[INFO] Activities server listening on http://localhost:${address.port}`
        );
        console.log(`[INFO] Environment: ${config.env}`);
        resolve(address);
      });
    });
  }

  public async close(): Promise<void> {
    this.unsubscribeRoster?.();
    this.unsubscribeRoster = null;
    await this.socketService.close();
    console.log("[INFO] Server closed");
  }
}

export default App;
