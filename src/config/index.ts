import "dotenv/config";
import path from "path";

export const config = {
  port: Number(process.env.PORT) || 8000,
  env: process.env.NODE_ENV || "development",
  cors: {
    origin: process.env.CORS_ORIGIN || "*",
  },
  static: {
    dir: process.env.STATIC_DIR || path.resolve(process.cwd(), "public"),
    mountPath: "/static",
    indexPage: "/static/index.html",
  },
};
