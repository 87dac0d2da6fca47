import colyseusTools from "@colyseus/tools";
import { RedisPresence } from "@colyseus/redis-presence";
import { RedisDriver } from "@colyseus/redis-driver";
import { monitor } from "@colyseus/monitor";
import { matchMaker } from "@colyseus/core";
import express from "express";
import { config as envConfig } from "./config.js";
import { CombatRoom } from "./rooms/CombatRoom.js";

// Parse Redis URL into options object so we can disable ready check.
// Ready check sends INFO command which fails if connection is already in subscriber mode.
function parseRedisUrl(url: string) {
  const parsed = new URL(url);
  return {
    host: parsed.hostname || "localhost",
    port: parseInt(parsed.port, 10) || 6379,
    password: parsed.password || undefined,
    db: parsed.pathname ? parseInt(parsed.pathname.slice(1), 10) || 0 : 0,
    enableReadyCheck: false,
  };
}

// Single process unless Redis is configured.
const redisOptions = envConfig.redisUri ? parseRedisUrl(envConfig.redisUri) : null;

export default colyseusTools.default({
  options: redisOptions
    ? {
        presence: new RedisPresence(redisOptions),
        driver: new RedisDriver(redisOptions),
      }
    : {},

  initializeGameServer: (gameServer) => {
    gameServer.define("combat", CombatRoom);
  },

  initializeExpress: (app) => {
    app.use(express.json({ limit: "100kb" }));

    // Colyseus monitor (dev-only): view rooms and inspect live room state.
    if (envConfig.nodeEnv !== "production") {
      app.use("/monitor", monitor());
    }

    // Health check endpoint
    app.get("/healthz", (_req, res) => {
      res.json({ status: "ok", timestamp: Date.now() });
    });

    // Bullet simulator telemetry per room
    app.get("/stats", async (_req, res) => {
      try {
        const rooms = await matchMaker.query({ name: "combat" });
        res.json({
          rooms: rooms.map((room) => ({
            roomId: room.roomId,
            clients: room.clients,
            maxClients: room.maxClients,
            bullets: room.metadata?.bullets ?? null,
          })),
          count: rooms.length,
          timestamp: Date.now(),
        });
      } catch (error) {
        console.error("Error fetching stats:", error);
        res.status(500).json({ error: "Failed to fetch stats" });
      }
    });
  },

  beforeListen: () => {
    console.log(`Combat server starting on port ${envConfig.port}`);
    console.log(`Bullet workers: ${envConfig.workerMode}`);
    if (!redisOptions) console.log("Redis not configured, running single-process");
  },
});
