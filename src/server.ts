import express from "express";
import cors from "cors";
import { loadAppConfig } from "./config/appConfig";
import { closePool } from "./db";
import { createCompletionClient } from "./lib/openaiClient";
import { createAgenciesRouter } from "./modules/agencies/routes";
import { createProposalsRouter } from "./modules/proposals/routes";

const config = loadAppConfig();

const app = express();
app.use(cors());
app.use(express.json());

// Mount module routers
app.use("/agencies", createAgenciesRouter(config));
app.use(
  "/proposals",
  createProposalsRouter({ config, clientFactory: createCompletionClient })
);

// Health
app.get("/health", (_req, res) => {
  res.json({ ok: true, model: config.model, default_agency: config.defaultAgency });
});

const server = app.listen(config.port, () => {
  console.log(`API listening on http://localhost:${config.port}`);
});

process.on("SIGTERM", () => {
  server.close(() => {
    closePool().catch((e: unknown) => {
      console.error("failed to close db pool:", e);
      process.exitCode = 1;
    });
  });
});
