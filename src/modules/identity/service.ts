// src/modules/identity/service.ts
// ============================================================================
// Identity-Service: Profil lesen + aktualisieren
// ============================================================================

import { AuthenticationError, BadRequestError } from "../../libs/errors.js";
import { toPublicUser, type ProfilePatch, type PublicUser, type UserRepository } from "./types.js";

export async function getProfile(store: UserRepository, userId: string): Promise<PublicUser> {
  const user = await store.findUserById(userId);
  // Gelöschte/deaktivierte User haben trotz gültigem Token kein Profil
  if (!user || !user.is_active) {
    throw new AuthenticationError("user_inactive");
  }
  return toPublicUser(user);
}

export async function updateProfile(
  store: UserRepository,
  userId: string,
  patch: ProfilePatch,
): Promise<PublicUser> {
  if (patch.name === undefined && patch.locale === undefined) {
    throw new BadRequestError("Nothing to update.");
  }

  const user = await store.updateUserProfile(userId, patch);
  if (!user || !user.is_active) {
    throw new AuthenticationError("user_inactive");
  }
  return toPublicUser(user);
}
