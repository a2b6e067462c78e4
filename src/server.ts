import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createExecutionRunner } from "./judge/runner";

dotenv.config();

const config = loadConfig();
const runner = createExecutionRunner(config);
const app = createApp({ runner, config });

app.listen(config.port, () => {
  console.log(`Mini Judge listening on port ${config.port}`);
});
