import type pino from "pino";
import { z } from "zod";
import { NotFoundError } from "../errors";
import type { User, UserProfile } from "../repositories/tables";
import type { DataStore } from "../repositories/types";
import { UserRole, USER_ROLE_LABELS } from "../shared-types";
import { parseInput, ProfileInputSchema, UserInputSchema } from "../validators";
import { assertUnique, requireRecord } from "./guards";

export class UserService {
  private logger: pino.Logger;

  constructor(
    private store: DataStore,
    logger: pino.Logger
  ) {
    this.logger = logger.child({ component: "UserService" });
  }

  async createUser(input: z.input<typeof UserInputSchema>): Promise<User> {
    const data = parseInput(UserInputSchema, input);
    await assertUnique(this.store.users, { username: data.username });
    const user = await this.store.users.create(data);
    this.logger.info({ userId: user.id, username: user.username }, "User created");
    return user;
  }

  async getUser(userId: number): Promise<User> {
    return requireRecord(this.store.users, userId);
  }

  /**
   * Attach a user to an organization with a role. A user has at most one
   * profile.
   */
  async createProfile(input: z.input<typeof ProfileInputSchema>): Promise<UserProfile> {
    const data = parseInput(ProfileInputSchema, input);
    return this.store.transaction(async (tx) => {
      await requireRecord(tx.users, data.userId);
      await requireRecord(tx.organizations, data.organizationId);
      await assertUnique(tx.profiles, { userId: data.userId });
      const profile = await tx.profiles.create(data);
      this.logger.info(
        { userId: profile.userId, organizationId: profile.organizationId, role: USER_ROLE_LABELS[profile.role] },
        "User profile created"
      );
      return profile;
    });
  }

  async getProfile(userId: number): Promise<UserProfile | null> {
    return this.store.profiles.findOne({ userId });
  }

  async setRole(userId: number, role: UserRole): Promise<UserProfile> {
    const parsed = parseInput(z.enum(UserRole), role);
    const profile = await this.store.profiles.findOne({ userId });
    if (!profile) {
      throw new NotFoundError("UserProfile", userId);
    }
    const updated = await this.store.profiles.update(profile.id, { role: parsed });
    this.logger.info({ userId, role: USER_ROLE_LABELS[parsed] }, "User role changed");
    return updated;
  }

  async listProfiles(organizationId: number): Promise<UserProfile[]> {
    await requireRecord(this.store.organizations, organizationId);
    return this.store.profiles.findMany({ organizationId });
  }
}
