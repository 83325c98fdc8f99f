/**
 * Actor Types
 *
 * Front-ends authenticate the caller; every API handler receives the
 * resolved actor.
 */

/**
 * Actor Context - Who is performing the action
 */
export interface ActorContext {
  type: 'user' | 'admin';
  userId: string;
  displayName: string | null;
  requestId: string;
}
