import { createApp } from "./app";
import { log } from "./core/logger";
import { validateEnvironment } from "./core/env-validation";
import { startIntegration, stopIntegration } from "./integration";

// Environment prüfen bevor irgendetwas startet
const envResult = validateEnvironment();
if (!envResult.valid) {
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  log("error", "system", "Unbehandelte Promise-Rejection", reason instanceof Error ? reason.message : String(reason));
});

(async () => {
  const { server } = createApp({ apiKey: process.env.API_KEY });

  const port = parseInt(process.env.PORT || "3000", 10);
  server.listen(
    {
      port,
      host: process.env.HOST || "0.0.0.0",
    },
    () => {
      log("info", "system", `🚀 FoxBridge läuft auf Port ${port}`);
    }
  );

  // Erster Poll erst nach dem Listen: /api/status ist sofort erreichbar
  await startIntegration();

  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log("info", "system", `🛑 Server wird heruntergefahren... (Signal: ${signal})`);

    // Falls Cleanup hängt, trotzdem nach 5s beenden
    const forceExitTimer = setTimeout(() => {
      log("warning", "system", "⚠️ Shutdown-Timeout (5s) erreicht - erzwinge Exit");
      process.exit(1);
    }, 5000);
    forceExitTimer.unref();

    try {
      // 1. FHEM-Sync und Coordinator stoppen (wartet auf laufenden Poll)
      await stopIntegration();

      // 2. HTTP-Server schließen
      server.close(() => {
        log("info", "system", "✅ HTTP-Server geschlossen");
      });

      log("info", "system", "✅ Graceful Shutdown abgeschlossen");
    } catch (error) {
      log("error", "system", "Fehler beim Shutdown", error instanceof Error ? error.message : String(error));
    }

    clearTimeout(forceExitTimer);
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
})().catch((error: unknown) => {
  log("error", "system", "❌ Server-Start fehlgeschlagen", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
