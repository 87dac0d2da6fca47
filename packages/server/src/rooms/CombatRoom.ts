import { Room, type Client } from "@colyseus/core";
import { LocalWorkerHost } from "@volley/bullets";
import { config } from "../config.js";
import { loadArena } from "./arena.js";
import { COMBAT_CONFIG } from "./combatConfig.js";
import { CombatSession } from "./CombatSession.js";
import type { CombatState } from "./schema/CombatState.js";

/**
 * Combat room
 *
 * Handles:
 * - Forwarding movement and fire messages to the combat session
 * - Driving the session once per simulation tick
 * - Broadcasting hits and publishing simulator stats as metadata
 */
export class CombatRoom extends Room<CombatState> {
  maxClients = config.maxClients;

  private readonly session = new CombatSession({
    arena: loadArena(),
    respawnMs: config.respawnMs,
    simulator: config.simulator,
    workerFactory: config.workerMode === "inline" ? new LocalWorkerHost({ autoTick: true }).factory : undefined,
    onHit: (hit) => this.broadcast("bullet:hit", hit),
  });
  private lastMetadataAt = 0;

  onCreate(_options: Record<string, unknown>) {
    this.setState(this.session.state);

    this.onMessage("move", (client, message: unknown) => {
      this.session.move(client.sessionId, message);
    });
    this.onMessage("fire", (client, message: unknown) => {
      const fired = this.session.fire(client.sessionId, message);
      if (fired) client.send("bullet:fired", fired);
    });

    this.setSimulationInterval(() => this.update(), this.session.tickMs);

    console.log(`[CombatRoom] Created ${this.roomId} (${config.workerMode} workers)`);
  }

  onJoin(client: Client) {
    const combatant = this.session.join(client.sessionId);
    console.log(`[CombatRoom] ${client.sessionId} joined as participant ${combatant.participant}`);
  }

  onLeave(client: Client) {
    this.session.leave(client.sessionId);
    console.log(`[CombatRoom] ${client.sessionId} left`);
  }

  async onDispose() {
    await this.session.shutdown();
    console.log(`[CombatRoom] Disposed ${this.roomId}`);
  }

  private update() {
    this.session.tick();

    const now = Date.now();
    if (now - this.lastMetadataAt >= COMBAT_CONFIG.metadataIntervalMs) {
      this.lastMetadataAt = now;
      this.setMetadata({ bullets: this.session.dispatcher.getStats() }).catch((error: unknown) => {
        console.warn("[CombatRoom] Failed to update metadata:", error);
      });
    }
  }
}
