// backend/services/trends/src/routes/terms.router.ts
/**
 * Versioned routes for the rising-terms table.
 * Routes are one-liners: import handlers only; no logic here.
 */

import { Router } from "express";
import type { TermsController } from "../controllers/TermsController";

export class TermsRouter {
  private readonly _router = Router();

  constructor(private readonly controller: TermsController) {}

  router(): Router {
    this._router.post("/terms", this.controller.insert());
    this._router.get("/terms", this.controller.select());
    return this._router;
  }
}
