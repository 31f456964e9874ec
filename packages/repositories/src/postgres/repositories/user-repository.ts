import { eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { logUsers } from '../schema/index.js';
import type { UserRepository, CreateUserInput } from '../../interfaces/index.js';
import type { Id, User } from '@surflog/protocol';
import { deleteSessionsCascade, sessionsOfUser } from './cascade.js';

export class PgUserRepository implements UserRepository {
  constructor(private db: DbExecutor) {}

  async create(input: CreateUserInput): Promise<User> {
    const [row] = await this.db
      .insert(logUsers)
      .values({
        username: input.username,
        passkey: input.passkey,
        email: input.email ?? null,
      })
      .returning();

    return this.rowToUser(row);
  }

  async get(id: Id): Promise<User | null> {
    const [row] = await this.db.select().from(logUsers).where(eq(logUsers.id, id));
    return row ? this.rowToUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const [row] = await this.db.select().from(logUsers).where(eq(logUsers.username, username));
    return row ? this.rowToUser(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const [locked] = await tx
        .select({ id: logUsers.id })
        .from(logUsers)
        .where(eq(logUsers.id, id))
        .for('update');
      if (!locked) return false;

      await deleteSessionsCascade(tx, sessionsOfUser(id));
      await tx.delete(logUsers).where(eq(logUsers.id, id));
      return true;
    });
  }

  private rowToUser(row: typeof logUsers.$inferSelect): User {
    return {
      id: row.id,
      username: row.username,
      passkey: row.passkey,
      email: row.email,
    };
  }
}
