import { SocialError } from "./errors.js";
import type { Identity, Profile } from "./types.js";

export class IdentityRegistry {
  private readonly profiles = new Map<Identity, Profile>();

  has(identity: Identity) {
    const profile = this.profiles.get(identity);
    return Boolean(profile && profile.username.length > 0);
  }

  assertCanCreate(identity: Identity) {
    if (this.has(identity)) {
      throw new SocialError("AlreadyExists");
    }
  }

  create(identity: Identity, username: string, bio: string, createdAt: string): Profile {
    this.assertCanCreate(identity);
    // An empty username would read back as "no profile" and reopen creation.
    if (username.length === 0) {
      throw new SocialError("InvalidUsername");
    }
    const profile: Profile = { identity, username, bio, createdAt };
    this.profiles.set(identity, profile);
    return profile;
  }

  get(identity: Identity): Profile | null {
    return this.has(identity) ? (this.profiles.get(identity) ?? null) : null;
  }
}
