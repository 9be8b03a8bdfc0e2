// mmo-backend/server.ts

import http from "http";
import dotenv from "dotenv";
import { WebSocketServer, WebSocket } from "ws";

import { installFileLogTap } from "./FileLogTap";
import { loadNetConfig, type NetworkConfig } from "./config";

import { Logger } from "../worldcore/utils/logger";
import { SessionManager } from "../worldcore/core/SessionManager";
import { MessageRouter } from "../worldcore/core/MessageRouter";
import { InteractionHub } from "../worldcore/core/InteractionHub";
import { buildInteractionCore } from "../worldcore/core/InteractionCore";
import { startHeartbeat } from "../worldcore/core/Heartbeat";
import { TickEngine } from "../worldcore/core/TickEngine";
import { TokenVerifier } from "../worldcore/auth/TokenVerifier";
import { loadInteractionConfig } from "../worldcore/config/interactionConfig";
import { InMemoryWorldStore } from "../worldcore/world/InMemoryWorldStore";
import { PostgresWorldStore } from "../worldcore/world/PostgresWorldStore";
import { WorldEventBus } from "../worldcore/world/WorldEventBus";
import { loadCatalog, loadOccluders } from "../worldcore/world/WorldSeedLoader";
import { InMemoryFundsLedger } from "../worldcore/economy/InMemoryFundsLedger";
import { PostgresFundsLedger } from "../worldcore/economy/PostgresFundsLedger";
import type { FundsLedger } from "../worldcore/economy/FundsLedger";
import type { WorldMutationStore } from "../worldcore/world/WorldIndex";
import type { LockStore } from "../worldcore/locks/LockStore";
import { RedisLockStore } from "../worldcore/locks/RedisLockStore";

dotenv.config();
installFileLogTap();

const log = Logger.scope("SERVER");

function describeSocket(req: http.IncomingMessage): string {
  const r = req.socket;
  return `${r.remoteAddress || "?"}:${r.remotePort || "?"}`;
}

interface Stores {
  mutations: WorldMutationStore;
  ledger: FundsLedger;
  lockStore?: LockStore;
}

async function openStores(cfg: NetworkConfig, world: InMemoryWorldStore): Promise<Stores> {
  let stores: Stores = { mutations: world, ledger: new InMemoryFundsLedger() };

  if (cfg.storage === "postgres") {
    const { testDbConnection } = await import("../worldcore/db/Database");
    if (!(await testDbConnection())) {
      throw new Error("BW_STORAGE=postgres but Postgres is unreachable");
    }

    const pgWorld = new PostgresWorldStore(world);
    await pgWorld.hydrate();
    stores = { mutations: pgWorld, ledger: new PostgresFundsLedger() };
  }

  if (cfg.lockStore === "redis") {
    const { redis, ensureRedisConnected } = await import("../worldcore/db/Database");
    await ensureRedisConnected();
    stores.lockStore = new RedisLockStore(redis);
  }

  return stores;
}

async function main(): Promise<void> {
  const netConfig = loadNetConfig();
  const interaction = loadInteractionConfig();

  log.info("Starting shard server...", {
    host: netConfig.host,
    port: netConfig.port,
    path: netConfig.path,
    storage: netConfig.storage,
    lockStore: netConfig.lockStore,
  });

  const events = new WorldEventBus();
  const world = new InMemoryWorldStore(
    { catalog: loadCatalog(), occluders: loadOccluders() },
    events,
  );

  const stores = await openStores(netConfig, world);
  const core = buildInteractionCore({
    config: interaction,
    world,
    mutations: stores.mutations,
    ledger: stores.ledger,
    lockStore: stores.lockStore,
    events,
  });

  events.on("object.recalled", ({ object, ownerId }) => {
    log.info("Object recalled to owner", { instanceId: object.instanceId, ownerId, itemId: object.id });
  });

  const sessions = new SessionManager();
  const hub = new InteractionHub({
    sessions,
    candidates: world,
    visibility: core.visibility,
    validator: core.validator,
    ledger: core.ledger,
    tracker: interaction,
    avatars: world,
    events,
  });

  if (!netConfig.jwtSecret && !netConfig.authOptional) {
    throw new Error("BW_AUTH_OPTIONAL=false requires BW_JWT_SECRET");
  }
  const verifier = netConfig.jwtSecret ? new TokenVerifier(netConfig.jwtSecret) : null;
  const router = new MessageRouter(sessions, hub, verifier, { authOptional: netConfig.authOptional });

  const ticks = new TickEngine(hub, sessions, { intervalMs: netConfig.tickIntervalMs });
  ticks.start();

  const heartbeat = startHeartbeat(sessions, hub, {
    intervalMs: netConfig.heartbeatIntervalMs,
    idleTimeoutMs: netConfig.idleTimeoutMs,
  });

  const server = http.createServer((_req, res) => {
    res.writeHead(200, { "content-type": "text/plain" });
    res.end("buildworld shard\n");
  });

  const wss = new WebSocketServer({ server, path: netConfig.path });

  wss.on("connection", (socket: WebSocket, req: http.IncomingMessage) => {
    const session = sessions.createSession(socket, "guest");

    log.info("Client connected", {
      sessionId: session.id,
      remote: describeSocket(req),
    });

    // A token on the URL (?token=...) attaches immediately; otherwise the
    // client sends hello.
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const token = url.searchParams.get("token");
      const identity = token && verifier ? verifier.verifyToken(token) : null;
      if (identity) {
        router.attachIdentity(session, identity);
      } else if (token && !netConfig.authOptional) {
        socket.close(4001, "auth_failed");
        sessions.removeSession(session.id);
        return;
      }
    } catch (err: unknown) {
      log.error("Error parsing auth token / URL", { err });
      if (!netConfig.authOptional) {
        socket.close(4002, "auth_error");
        sessions.removeSession(session.id);
        return;
      }
    }

    socket.on("message", (data) => {
      router.handleRawMessage(session, data).catch((err: unknown) => {
        log.error("Unhandled router error", { sessionId: session.id, err });
      });
    });

    socket.on("close", () => {
      hub.detach(session.id);
      sessions.removeSession(session.id);
    });
  });

  server.listen(netConfig.port, netConfig.host, () => {
    log.success("Shard listening", {
      host: netConfig.host,
      port: netConfig.port,
      authOptional: netConfig.authOptional,
    });
  });

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal, sessions: sessions.count() });
    ticks.stop();
    clearInterval(heartbeat);
    for (const s of [...sessions.getAllSessions()]) {
      hub.detach(s.id);
      sessions.removeSession(s.id);
    }
    wss.close();
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// Entry point
main().catch((err: unknown) => {
  log.error("Fatal error in shard server", { err });
  process.exit(1);
});
