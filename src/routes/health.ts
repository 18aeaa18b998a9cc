import { Router } from "express";
import type { Clock } from "../utils/clock";

/** Liveness only; touches neither the database nor remote capabilities. */
export function createHealthRouter(clock: Clock): Router {
  const router = Router();
  router.get("/", (_req, res) => {
    res.json({ status: "healthy", timestamp: clock.now().toISOString() });
  });
  return router;
}
