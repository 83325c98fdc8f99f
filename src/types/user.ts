/**
 * User Domain Types
 *
 * Users are created lazily on first interaction. `id` is the external
 * identity of the account (a Telegram user id for the bot front-end).
 */

export interface UserRecord {
  id: string;
  username: string | null;
  displayName: string | null;
  isAdmin: boolean;
  isBanned: boolean;
  storageUsedBytes: number;
  createdAt: Date;
}

/**
 * Identity fields supplied by a front-end on first contact
 */
export interface UserIdentity {
  id: string;
  username?: string | null;
  displayName?: string | null;
}
