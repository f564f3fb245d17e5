import { Router } from "express";
import type { GenerateStreamDeps } from "./generateStream";
import { createGenerateStreamRouter } from "./generateStream";

export function createProposalsRouter(deps: GenerateStreamDeps) {
  const router = Router();
  router.use(createGenerateStreamRouter(deps));
  return router;
}
