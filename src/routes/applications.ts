// src/routes/applications.ts
import { Router, type RequestHandler } from "express";
import type { Services } from "../services";
import type { SessionMiddleware } from "../middleware/requireSession";
import { asyncHandler } from "../middleware/asyncHandler";
import { mustGetActor } from "../auth/identity";
import { parseIdParam } from "./params";

export function createApplicationsRouter(
  services: Pick<Services, "applications">,
  session: SessionMiddleware
): Router {
  const router = Router();
  const { applications } = services;

  router.use(session.requireSession);

  const listMine: RequestHandler = asyncHandler(async (req, res) => {
    res.json({ applications: await applications.listMine(mustGetActor(req)) });
  });

  /**
   * @openapi
   * /applications/mine:
   *   get:
   *     summary: The seeker's applications, each with its job
   *     tags: [Applications]
   *     security: [{ bearerAuth: [] }]
   */
  router.get("/mine", listMine);
  router.get("/user", listMine); // path the first web client calls

  /**
   * @openapi
   * /applications/job/{jobId}:
   *   get:
   *     summary: Applications to a job, each with the applicant
   *     tags: [Applications]
   *     security: [{ bearerAuth: [] }]
   */
  router.get(
    "/job/:jobId",
    asyncHandler(async (req, res) => {
      const list = await applications.listForJob(mustGetActor(req), parseIdParam(req.params.jobId, "Job"));
      res.json({ applications: list });
    })
  );

  /**
   * @openapi
   * /applications/{id}:
   *   get:
   *     summary: One application, projected for the caller's role
   *     tags: [Applications]
   *     security: [{ bearerAuth: [] }]
   */
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const application = await applications.get(mustGetActor(req), parseIdParam(req.params.id, "Application"));
      res.json({ application });
    })
  );

  /**
   * @openapi
   * /applications/{id}/status:
   *   put:
   *     summary: Move an application to another status
   *     tags: [Applications]
   *     security: [{ bearerAuth: [] }]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               status: { type: string, enum: [pending, approved, rejected, interview] }
   */
  router.put(
    "/:id/status",
    asyncHandler(async (req, res) => {
      const application = await applications.updateStatus(
        mustGetActor(req),
        parseIdParam(req.params.id, "Application"),
        req.body
      );
      res.json({ message: "Application status updated successfully", application });
    })
  );

  return router;
}
