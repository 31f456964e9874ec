import type { Id, Session } from '@surflog/protocol';

/**
 * Input for inserting a Session row.
 * All six ids must reference existing rows when the unit of work commits.
 */
export type InsertSessionInput = Omit<Session, 'id'>;

/**
 * Repository interface for Session operations.
 *
 * Sessions are immutable once written and only disappear through the
 * cascade from their location or user.
 */
export interface SessionRepository {
  /**
   * Insert a Session row.
   * Rejects when any referenced row does not exist.
   */
  insert(input: InsertSessionInput): Promise<Session>;

  get(id: Id): Promise<Session | null>;
}
