import express from "express";
import type { Logger } from "pino";
import { makeRoutes } from "./api/routes.js";
import { errorHandler } from "./api/errors.js";
import { RequestStore } from "./store/store.js";
import { Workflow } from "./plugin/createWorkflow.js";

export function createApp(args: { store: RequestStore; workflow: Workflow; logger: Logger }) {
  const app = express();
  app.use(express.json({ limit: "512kb" }));

  app.use("/api", makeRoutes({ store: args.store, workflow: args.workflow }));
  app.use(errorHandler(args.logger));

  return app;
}
