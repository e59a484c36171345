// src/routes/auth.ts
import { Router } from "express";
import type { Services } from "../services";
import type { SessionMiddleware } from "../middleware/requireSession";
import { asyncHandler } from "../middleware/asyncHandler";
import { mustGetActor } from "../auth/identity";

export function createAuthRouter(services: Pick<Services, "auth">, session: SessionMiddleware): Router {
  const router = Router();
  const { auth } = services;

  /**
   * @openapi
   * /auth/register:
   *   post:
   *     summary: Register a job seeker or employer account
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password, firstName, lastName, role]
   *             properties:
   *               email: { type: string }
   *               password: { type: string, minLength: 8 }
   *               firstName: { type: string }
   *               lastName: { type: string }
   *               role: { type: string, enum: [seeker, employer] }
   *               company: { type: string, description: Required for employers }
   *     responses:
   *       201: { description: Account created with a session token }
   *       400: { description: Invalid body }
   *       409: { description: Email already registered }
   */
  router.post(
    "/register",
    asyncHandler(async (req, res) => {
      const { token, user } = await auth.register(req.body);
      req.log?.info({ event: "user_registered", userId: user.id, role: user.role }, "User registered");
      res.status(201).json({ message: "User registered successfully", token, user });
    })
  );

  /**
   * @openapi
   * /auth/login:
   *   post:
   *     summary: Exchange email and password for a session token
   *     tags: [Auth]
   *     responses:
   *       200: { description: Logged in }
   *       401: { description: Invalid email or password }
   */
  router.post(
    "/login",
    asyncHandler(async (req, res) => {
      const { token, user } = await auth.login(req.body);
      res.json({ message: "Login successful", token, user });
    })
  );

  /**
   * @openapi
   * /auth/profile:
   *   get:
   *     summary: Current user's profile
   *     tags: [Auth]
   *     security: [{ bearerAuth: [] }]
   *   put:
   *     summary: Update first name, last name or (employers) company
   *     tags: [Auth]
   *     security: [{ bearerAuth: [] }]
   */
  router.get("/profile", session.requireSession, (req, res) => {
    res.json({ user: auth.getProfile(mustGetActor(req)) });
  });

  router.put(
    "/profile",
    session.requireSession,
    asyncHandler(async (req, res) => {
      const user = await auth.updateProfile(mustGetActor(req), req.body);
      res.json({ message: "Profile updated successfully", user });
    })
  );

  return router;
}
