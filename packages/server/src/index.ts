import { listen } from "@colyseus/tools";
import app from "./app.config.js";
import { config } from "./config.js";

listen(app, config.port).catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
