import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { pino } from "pino";

import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { FileStore } from "./store/file.js";
import { FileDirectory } from "./directory/file.js";
import { createWorkflow } from "./plugin/createWorkflow.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

async function main() {
  const store = new FileStore(config.dataDir);
  const directory = new FileDirectory(config.directoryFile);
  await store.init();
  await directory.init();

  const workflow = createWorkflow({ store, directory, logger: log });
  const app = createApp({ store, workflow, logger: log });

  const approvers = await directory.listApprovers();
  app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DATA_DIR: config.dataDir,
        DIRECTORY_FILE: config.directoryFile,
        APPROVERS: approvers.length
      },
      "Approval router running (FileStore)"
    );
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
