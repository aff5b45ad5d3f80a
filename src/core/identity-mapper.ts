import type { RemoteIdentity, RemoteRoom } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("identity-mapper");

export interface IdentityFetchers {
  fetchUser(userId: string): Promise<RemoteIdentity>;
  fetchRoom(roomId: string): Promise<RemoteRoom>;
}

/** Inline user data carried by an event; used instead of a fetch when complete */
export interface IdentityHint {
  userId: string;
  username?: string;
  displayName?: string;
}

/**
 * Caches server users and rooms by id.
 *
 * All cache writes go through this class. A lookup for an id that is already being
 * fetched joins the in-flight request instead of issuing a second one. Failed fetches
 * are not cached, so the next lookup tries again.
 */
export class IdentityMapper {
  private readonly users = new Map<string, RemoteIdentity>();
  private readonly rooms = new Map<string, RemoteRoom>();
  private readonly pendingUsers = new Map<string, Promise<RemoteIdentity>>();
  private readonly pendingRooms = new Map<string, Promise<RemoteRoom>>();

  constructor(private readonly fetchers: IdentityFetchers) {}

  async resolveUser(userId: string, hint?: IdentityHint): Promise<RemoteIdentity> {
    const cached = this.users.get(userId);
    if (cached) return cached;

    if (hint?.username && hint.userId === userId) {
      return this.remember({
        userId,
        username: hint.username,
        displayName: hint.displayName || hint.username,
      });
    }

    return this.load(userId, this.users, this.pendingUsers, () => this.fetchers.fetchUser(userId));
  }

  async resolveRoom(roomId: string): Promise<RemoteRoom> {
    const cached = this.rooms.get(roomId);
    if (cached) return cached;
    return this.load(roomId, this.rooms, this.pendingRooms, () => this.fetchers.fetchRoom(roomId));
  }

  /** Seed the user cache with an identity obtained elsewhere (e.g. the login response). */
  remember(identity: RemoteIdentity): RemoteIdentity {
    const frozen = Object.freeze({ ...identity });
    this.users.set(identity.userId, frozen);
    return frozen;
  }

  /**
   * Called on a server "user updated" event; the next lookup refetches. A fetch already
   * in flight still answers its callers but no longer writes the cache.
   */
  invalidateUser(userId: string): void {
    const dropped = this.pendingUsers.delete(userId);
    if (this.users.delete(userId) || dropped) {
      log.debug({ userId }, "User cache entry invalidated");
    }
  }

  peekUser(userId: string): RemoteIdentity | undefined {
    return this.users.get(userId);
  }

  peekRoom(roomId: string): RemoteRoom | undefined {
    return this.rooms.get(roomId);
  }

  private load<T>(
    key: string,
    cache: Map<string, T>,
    pending: Map<string, Promise<T>>,
    fetch: () => Promise<T>,
  ): Promise<T> {
    const inFlight = pending.get(key);
    if (inFlight) return inFlight;

    const request: Promise<T> = fetch()
      .then((value) => {
        if (pending.get(key) !== request) {
          log.debug({ key }, "Identity invalidated while fetching, not cached");
          return value;
        }
        cache.set(key, value);
        log.debug({ key }, "Identity cached");
        return value;
      })
      .finally(() => {
        if (pending.get(key) === request) pending.delete(key);
      });

    pending.set(key, request);
    return request;
  }
}
