// server/src/index.ts
import { createApp } from "./app";
import { loadConfig } from "./config";

function main(): void {
  const config = loadConfig();
  const app = createApp({ config });

  const server = app.listen(config.port, config.host, () => {
    const shown = config.host === "0.0.0.0" ? "localhost" : config.host;
    console.log("🚴 Team Ride Dashboard – API");
    console.log("=".repeat(50));
    console.log(`📊 API:      http://${shown}:${config.port}/api/stats`);
    console.log(`🏁 Results:  http://${shown}:${config.port}/api/results`);
    console.log(`📁 Sample:   ${config.sampleDataPath}`);
    console.log("=".repeat(50));
    console.log("Ctrl+C for å stoppe serveren");
  });

  server.on("error", (err) => {
    console.error("[server] klarte ikke å starte:", err.message);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} – stopper`);
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  console.error("[server] oppstart feilet:", err instanceof Error ? err.message : err);
  process.exit(1);
}
