// src/routes/admin.ts
import { Router } from "express";
import type { Services } from "../services";
import type { SessionMiddleware } from "../middleware/requireSession";
import { asyncHandler } from "../middleware/asyncHandler";
import { mustGetActor } from "../auth/identity";
import { parseIdParam } from "./params";

export function createAdminRouter(
  services: Pick<Services, "moderation" | "admin">,
  session: SessionMiddleware
): Router {
  const router = Router();
  const { moderation, admin } = services;

  router.use(session.requireSession);

  /**
   * @openapi
   * /admin/jobs/pending:
   *   get:
   *     summary: Jobs waiting for moderation
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   */
  router.get(
    "/jobs/pending",
    asyncHandler(async (req, res) => {
      res.json({ jobs: await moderation.listPending(mustGetActor(req)) });
    })
  );

  /**
   * @openapi
   * /admin/jobs/{id}/approve:
   *   post:
   *     summary: Approve a pending job
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   * /admin/jobs/{id}/reject:
   *   post:
   *     summary: Reject a pending job, optionally with a reason for the employer
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   */
  router.post(
    "/jobs/:id/approve",
    asyncHandler(async (req, res) => {
      const job = await moderation.approve(mustGetActor(req), parseIdParam(req.params.id, "Job"));
      req.log?.info({ event: "job_approved", jobId: job.id }, "Job approved");
      res.json({ message: "Job approved successfully", job });
    })
  );

  router.post(
    "/jobs/:id/reject",
    asyncHandler(async (req, res) => {
      const job = await moderation.reject(mustGetActor(req), parseIdParam(req.params.id, "Job"), req.body);
      req.log?.info({ event: "job_rejected", jobId: job.id }, "Job rejected");
      res.json({ message: "Job rejected successfully", job });
    })
  );

  /**
   * @openapi
   * /admin/stats:
   *   get:
   *     summary: Platform totals, per-status breakdowns and 30-day activity
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   */
  router.get(
    "/stats",
    asyncHandler(async (req, res) => {
      res.json(await admin.stats(mustGetActor(req)));
    })
  );

  /**
   * @openapi
   * /admin/users:
   *   get:
   *     summary: All users, newest first
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   *     parameters:
   *       - in: query
   *         name: page
   *         schema: { type: integer, default: 1 }
   *       - in: query
   *         name: limit
   *         schema: { type: integer, default: 20, maximum: 100 }
   */
  router.get(
    "/users",
    asyncHandler(async (req, res) => {
      res.json(await admin.listUsers(mustGetActor(req), req.query));
    })
  );

  /**
   * @openapi
   * /admin/users/{id}:
   *   delete:
   *     summary: Delete a user with their jobs and applications
   *     tags: [Admin]
   *     security: [{ bearerAuth: [] }]
   */
  router.delete(
    "/users/:id",
    asyncHandler(async (req, res) => {
      const userId = parseIdParam(req.params.id, "User");
      const summary = await admin.deleteUser(mustGetActor(req), userId);
      req.log?.info({ event: "user_deleted", userId, ...summary }, "User deleted");
      res.json({ message: "User deleted successfully", ...summary });
    })
  );

  return router;
}
