import { startEnvServer } from "./wsServer";
import { envInt } from "../engine/rulesConstants";

async function main() {
  const port = envInt("BLEWIT_WS_PORT", 8787);
  const server = startEnvServer({ port });
  await server.ready;

  // eslint-disable-next-line no-console
  console.log(`Blew It env server listening on ws://localhost:${server.port}`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
