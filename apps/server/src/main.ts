import { errorMessage } from "@knxlens/core";
import { runServer } from "./app.js";

runServer().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
