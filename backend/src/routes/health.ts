import { Router } from "express";
import { ROUTES } from "./paths";

export default function healthRoutes(version: string): Router {
  const r = Router();
  r.get(ROUTES.health.path, (_req, res) => res.json({ status: "ok", version }));
  return r;
}
