import { configEnv } from "./config/env";
import { startServer } from "./server";

startServer(configEnv()).catch((err: unknown) => {
  console.error("Fatal error starting server:", err);
  process.exit(1);
});
