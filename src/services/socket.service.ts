import type { Server as HttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { config } from "../config";
import type { RosterChange } from "../types/activity.types";

export const ROSTER_UPDATE_EVENT = "roster-update";
export const ACTIVITY_ROSTER_EVENT = "activity-roster";

const activityRoom = (activityName: string) => `activity-${activityName}`;

/**
 * Pushes roster changes to browsers. Every client gets `roster-update`;
 * clients that joined an activity's room also get `activity-roster` for it.
 */
export class SocketService {
  private io: SocketIOServer | null = null;

  public initialize(httpServer: HttpServer): void {
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: config.cors.origin,
        methods: ["GET", "POST", "DELETE"],
      },
      transports: ["websocket", "polling"],
    });

    this.setupEventHandlers();
    console.log("[SOCKET] Socket.IO server initialized");
  }

  private setupEventHandlers(): void {
    if (!this.io) return;

    this.io.on("connection", (socket) => {
      console.log(`[SOCKET] Client connected: ${socket.id}`);

      socket.on("join-activity", (activityName: string) => {
        socket.join(activityRoom(activityName));
        console.log(
          `[SOCKET] Client ${socket.id} joined ${activityRoom(activityName)}`
        );

        socket.emit("joined-activity", { activityName });
      });

      socket.on("leave-activity", (activityName: string) => {
        socket.leave(activityRoom(activityName));
        console.log(
          `[SOCKET] Client ${socket.id} left ${activityRoom(activityName)}`
        );
      });

      socket.on("disconnect", (reason) => {
        console.log(
          `[SOCKET] Client disconnected: ${socket.id}, reason: ${reason}`
        );
      });
    });
  }

  public emitRosterUpdate(change: RosterChange): void {
    if (!this.io) {
      console.warn("[SOCKET] Socket.IO not initialized, cannot emit roster");
      return;
    }

    const payload = { ...change, timestamp: new Date().toISOString() };
    this.io.emit(ROSTER_UPDATE_EVENT, payload);
    this.io.to(activityRoom(change.activity)).emit(ACTIVITY_ROSTER_EVENT, payload);
    console.log(
      `[SOCKET] Emitted ${change.action} of ${change.email} for ${change.activity}`
    );
  }

  /** Closes Socket.IO together with the HTTP server it is attached to. */
  public close(): Promise<void> {
    if (!this.io) return Promise.resolve();

    const io = this.io;
    this.io = null;
    return new Promise((resolve, reject) => {
      io.close((error) => {
        // The HTTP server may never have started listening
        if (
          error &&
          !("code" in error && error.code === "ERR_SERVER_NOT_RUNNING")
        ) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
