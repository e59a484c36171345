// src/services/auth.service.ts
import type { UserRecord } from "../domain/types";
import { ConflictError, NotAuthenticatedError, NotFoundError } from "../domain/errors";
import { DECOY_DIGEST, hashPassword, verifyPassword } from "../auth/credentials";
import { UniqueConstraintError } from "../repositories/types";
import { loginSchema, parseInput, profileSchema, registerSchema } from "../validation/schemas";
import { toUserDTO, type UserDTO } from "./projections";
import type { ServiceContext } from "./context";

export interface SessionResult {
  token: string;
  user: UserDTO;
}

export class AuthService {
  constructor(private readonly ctx: ServiceContext) {}

  async register(body: unknown): Promise<SessionResult> {
    const input = parseInput(registerSchema, body);
    const { store, notifications, tokens } = this.ctx;

    if (await store.users.findByEmail(input.email)) {
      throw new ConflictError("User already exists");
    }

    const passwordHash = await hashPassword(input.password);

    const user = await store
      .transaction((tx) =>
        tx.users.create({
          email: input.email,
          passwordHash,
          firstName: input.firstName,
          lastName: input.lastName,
          role: input.role,
          company: input.role === "employer" ? input.company ?? null : null,
        })
      )
      .catch((err: unknown) => {
        // lost a race with a concurrent registration
        if (err instanceof UniqueConstraintError) throw new ConflictError("User already exists");
        throw err;
      });

    notifications.dispatch({ kind: "welcome", to: user.email, data: { firstName: user.firstName } });

    return { token: tokens.issue(user.id), user: toUserDTO(user) };
  }

  /**
   * Unknown email and wrong password fail the same way.
   */
  async login(body: unknown): Promise<SessionResult> {
    const input = parseInput(loginSchema, body);
    const user = await this.ctx.store.users.findByEmail(input.email);

    const matches = await verifyPassword(user?.passwordHash ?? DECOY_DIGEST, input.password);
    if (!user || !matches) {
      throw new NotAuthenticatedError("Invalid email or password");
    }

    return { token: this.ctx.tokens.issue(user.id), user: toUserDTO(user) };
  }

  getProfile(actor: UserRecord): UserDTO {
    return toUserDTO(actor);
  }

  async updateProfile(actor: UserRecord, body: unknown): Promise<UserDTO> {
    const input = parseInput(profileSchema, body);

    const patch = {
      ...(input.firstName !== undefined ? { firstName: input.firstName } : {}),
      ...(input.lastName !== undefined ? { lastName: input.lastName } : {}),
      // company belongs to employers; existing jobs keep the name they were posted with
      ...(input.company !== undefined && actor.role === "employer" ? { company: input.company } : {}),
    };

    const updated = await this.ctx.store.transaction((tx) => tx.users.update(actor.id, patch));
    if (!updated) throw new NotFoundError("User not found");
    return toUserDTO(updated);
  }
}
