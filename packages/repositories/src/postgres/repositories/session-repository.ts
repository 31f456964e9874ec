import { eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { sessionInfo } from '../schema/index.js';
import type { SessionRepository, InsertSessionInput } from '../../interfaces/index.js';
import type { Id, Session } from '@surflog/protocol';

export class PgSessionRepository implements SessionRepository {
  constructor(private db: DbExecutor) {}

  async insert(input: InsertSessionInput): Promise<Session> {
    const [row] = await this.db
      .insert(sessionInfo)
      .values({
        locId: input.locationId,
        tempId: input.temperatureId,
        swellId: input.swellId,
        tideId: input.tideId,
        windId: input.windId,
        userId: input.userId,
        sessionDate: input.date,
        sessionTimeIn: input.timeIn,
        sessionTimeOut: input.timeOut,
        sessionNotes: input.notes,
        rating: input.rating,
      })
      .returning();

    return this.rowToSession(row);
  }

  async get(id: Id): Promise<Session | null> {
    const [row] = await this.db.select().from(sessionInfo).where(eq(sessionInfo.id, id));
    return row ? this.rowToSession(row) : null;
  }

  private rowToSession(row: typeof sessionInfo.$inferSelect): Session {
    return {
      id: row.id,
      locationId: row.locId,
      temperatureId: row.tempId,
      swellId: row.swellId,
      tideId: row.tideId,
      windId: row.windId,
      userId: row.userId,
      date: row.sessionDate,
      timeIn: row.sessionTimeIn,
      timeOut: row.sessionTimeOut,
      notes: row.sessionNotes,
      rating: row.rating,
    };
  }
}
