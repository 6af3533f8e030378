import type { FriendRequestStore, FriendshipStore } from "../modules/friends/store.js";
import type { MessageStore } from "../modules/messages/store.js";
import type { UserStore } from "../modules/users/store.js";

/** Everything the services persist through. Mongo in production, in-process in tests. */
export interface Stores {
  users: UserStore;
  friendRequests: FriendRequestStore;
  friendships: FriendshipStore;
  messages: MessageStore;
  /** Run a check-then-write sequence atomically. */
  withTransaction<T>(fn: () => Promise<T>): Promise<T>;
}
