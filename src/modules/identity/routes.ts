// src/modules/identity/routes.ts
// ============================================================================
// Profil-Routen
// - GET   /auth/me    → eigenes Profil
// - PATCH /auth/me    → name / locale ändern
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError } from "../../libs/error-response.js";
import { AuthenticationError } from "../../libs/errors.js";
import { LocaleSchema } from "../../libs/normalize.js";
import { getProfile, updateProfile } from "./service.js";

const ProfilePatchSchema = z
  .object({
    name: z.string().trim().min(1).max(120).optional(),
    locale: LocaleSchema.optional(),
  })
  .strict();

export default async function identityRoutes(app: FastifyInstance) {
  app.get("/me", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const user = await getProfile(app.deps.store, req.user.sub);
    return reply.send({ user });
  });

  app.patch("/me", { config: { auth: true } }, async (req, reply) => {
    const parsed = ProfilePatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "VALIDATION_FAILED",
        "Invalid profile payload.",
        parsed.error.flatten(),
      );
    }

    if (!req.user) throw new AuthenticationError("missing_auth_context");
    const user = await updateProfile(app.deps.store, req.user.sub, parsed.data);
    return reply.send({ user });
  });
}
