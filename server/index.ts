import { createApp } from "./app.js";
import { AuthService } from "./auth/authService.js";
import { TokenService } from "./auth/tokens.js";
import { HistoryAssembler } from "./chat/historyAssembler.js";
import { SessionTurnQueue } from "./chat/sessionTurnQueue.js";
import { ChatStreamOrchestrator } from "./chat/streamOrchestrator.js";
import { loadAppConfig } from "./config/appConfig.js";
import { createLogger, describeError } from "./config/logger.js";
import { createProviderRegistry } from "./providers/registry.js";
import { SqliteChatStore } from "./store/chatStore.js";
import { openDatabase } from "./store/database.js";
import { UserStore } from "./store/userStore.js";

const log = createLogger("server");

async function main(): Promise<void> {
  const { config, envFile } = loadAppConfig();
  process.env.LOG_LEVEL = config.logLevel;

  const database = await openDatabase(config.database.path);
  const chatStore = new SqliteChatStore(database);
  const auth = new AuthService(
    new UserStore(database),
    new TokenService(config.auth.secret, config.auth.tokenTtlMinutes),
  );
  const providers = createProviderRegistry(config.providers);
  const orchestrator = new ChatStreamOrchestrator(
    {
      sessions: chatStore,
      conversations: chatStore,
      history: new HistoryAssembler(chatStore),
      providers,
    },
    {
      pacingMs: config.chat.pacingMs,
      turnQueue: config.chat.serializeSessionTurns ? new SessionTurnQueue() : null,
    },
  );

  const app = createApp({
    auth,
    sessions: chatStore,
    orchestrator,
    providers,
    providerSettings: config.providers,
    corsOrigin: config.server.corsOrigin,
  });

  const server = app.listen(config.server.port, config.server.host, () => {
    log.info("listening", {
      url: `http://${config.server.host}:${config.server.port}`,
      envFile,
      database: database.path,
      providers: providers.list(),
      pacingMs: config.chat.pacingMs,
      serializeSessionTurns: config.chat.serializeSessionTurns,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info("shutdown", { signal });
    server.close((err) => {
      if (err) {
        log.error("shutdown.failed", describeError(err));
      }
      database.close();
      process.exit(err ? 1 : 0);
    });
    // Open SSE responses would otherwise hold the server past the signal.
    server.closeAllConnections();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("startup.failed", describeError(err));
  process.exit(1);
});
