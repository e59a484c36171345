// src/routes/jobs.ts
import { Router } from "express";
import type { Services } from "../services";
import type { SessionMiddleware } from "../middleware/requireSession";
import { asyncHandler } from "../middleware/asyncHandler";
import { getActor, mustGetActor } from "../auth/identity";
import { parseIdParam } from "./params";

export function createJobsRouter(
  services: Pick<Services, "jobs" | "applications">,
  session: SessionMiddleware
): Router {
  const router = Router();
  const { jobs, applications } = services;

  /**
   * @openapi
   * /jobs:
   *   get:
   *     summary: Approved jobs, newest first
   *     tags: [Jobs]
   *     parameters:
   *       - in: query
   *         name: search
   *         description: Substring of title, description or company, or an exact skill
   *         schema: { type: string }
   *       - in: query
   *         name: location
   *         schema: { type: string }
   *       - in: query
   *         name: page
   *         schema: { type: integer, minimum: 1, default: 1 }
   *       - in: query
   *         name: limit
   *         schema: { type: integer, minimum: 1, maximum: 50, default: 10 }
   */
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      res.json(await jobs.listPublic(req.query));
    })
  );

  /**
   * @openapi
   * /jobs/mine:
   *   get:
   *     summary: The employer's own jobs in every status
   *     tags: [Jobs]
   *     security: [{ bearerAuth: [] }]
   */
  router.get(
    "/mine",
    session.requireSession,
    asyncHandler(async (req, res) => {
      res.json({ jobs: await jobs.listMine(mustGetActor(req)) });
    })
  );

  /**
   * @openapi
   * /jobs/{id}:
   *   get:
   *     summary: Job detail; the owner and admins also get its applications
   *     tags: [Jobs]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema: { type: integer }
   */
  router.get(
    "/:id",
    session.optionalSession,
    asyncHandler(async (req, res) => {
      const job = await jobs.getDetail(getActor(req), parseIdParam(req.params.id, "Job"));
      res.json({ job });
    })
  );

  /**
   * @openapi
   * /jobs:
   *   post:
   *     summary: Post a job; it waits for admin approval
   *     tags: [Jobs]
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       201: { description: Created with status pending }
   */
  router.post(
    "/",
    session.requireSession,
    asyncHandler(async (req, res) => {
      const job = await jobs.create(mustGetActor(req), req.body);
      req.log?.info({ event: "job_created", jobId: job.id }, "Job created");
      res.status(201).json({ message: "Job created successfully and pending approval", job });
    })
  );

  /**
   * @openapi
   * /jobs/{id}:
   *   put:
   *     summary: Edit a job; approved and rejected jobs go back to pending
   *     tags: [Jobs]
   *     security: [{ bearerAuth: [] }]
   *   delete:
   *     summary: Delete a job and its applications
   *     tags: [Jobs]
   *     security: [{ bearerAuth: [] }]
   */
  router.put(
    "/:id",
    session.requireSession,
    asyncHandler(async (req, res) => {
      const job = await jobs.update(mustGetActor(req), parseIdParam(req.params.id, "Job"), req.body);
      res.json({ message: "Job updated successfully", job });
    })
  );

  router.delete(
    "/:id",
    session.requireSession,
    asyncHandler(async (req, res) => {
      const jobId = parseIdParam(req.params.id, "Job");
      const { deletedApplications } = await jobs.delete(mustGetActor(req), jobId);
      req.log?.info({ event: "job_deleted", jobId, deletedApplications }, "Job deleted");
      res.json({ message: "Job deleted successfully", deletedApplications });
    })
  );

  /**
   * @openapi
   * /jobs/{id}/apply:
   *   post:
   *     summary: Apply to an approved job
   *     tags: [Applications]
   *     security: [{ bearerAuth: [] }]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               coverLetter: { type: string }
   *               resumeUrl: { type: string }
   *     responses:
   *       201: { description: Application submitted }
   *       409: { description: Already applied }
   */
  router.post(
    "/:id/apply",
    session.requireSession,
    asyncHandler(async (req, res) => {
      const application = await applications.apply(
        mustGetActor(req),
        parseIdParam(req.params.id, "Job"),
        req.body
      );
      res.status(201).json({ message: "Application submitted successfully", application });
    })
  );

  return router;
}
