import "dotenv/config";
import { readConfig } from "./config.js";
import { startServer } from "./server.js";

const loaded = readConfig();
if (!loaded.ok) {
  console.error(loaded.error.message);
  process.exit(1);
}
const { config } = loaded;

const result = await startServer(config);
if (!result.ok) {
  console.error(result.error.message);
  process.exit(1);
}

const { app } = result;
app.log.info({ pagesDir: config.pagesDir }, "wiki ready");

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app
      .close()
      .then(() => process.exit(0))
      .catch((e) => {
        console.error(e);
        process.exit(1);
      });
  });
}
