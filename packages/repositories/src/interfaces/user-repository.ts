import type { Id, User } from '@surflog/protocol';

/**
 * Input for creating a User (registration happens elsewhere; used by seeding)
 */
export type CreateUserInput = {
  username: string;
  passkey: string;
  email?: string | null;
};

/**
 * Repository interface for User operations.
 */
export interface UserRepository {
  /**
   * Create a new User.
   * Fails if the username is taken.
   */
  create(input: CreateUserInput): Promise<User>;

  get(id: Id): Promise<User | null>;

  /**
   * Resolve a username by exact, case-sensitive match.
   */
  findByUsername(username: string): Promise<User | null>;

  /**
   * Delete a User together with all of their sessions and those sessions'
   * reading rows.
   * @returns true if the user existed
   */
  delete(id: Id): Promise<boolean>;
}
