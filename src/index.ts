import { buildApp } from "./app";
import { loadAppConfig } from "./config/app_config";

async function main() {
  const config = loadAppConfig();
  const app = buildApp(config);

  const shutdown = (signal: string) => {
    app.log.info({ evt: "server.shutdown", signal }, "server.shutdown");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "server.shutdown_failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
