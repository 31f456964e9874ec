import { eq, sql, type SQL } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { sessionInfo, temps, swells, tides, winds } from '../schema/index.js';

/**
 * Delete the sessions matching `where` together with their reading rows, in
 * one statement.
 *
 * The session rows go first and hand their reading ids to the reading
 * deletes through RETURNING. The foreign key cascades fired by those deletes
 * find the sessions already gone. Callers run this inside a transaction
 * after locking the parent row.
 */
export async function deleteSessionsCascade(db: DbExecutor, where: SQL): Promise<void> {
  await db.execute(sql`
    WITH removed AS (
      DELETE FROM ${sessionInfo} WHERE ${where}
      RETURNING temp_id, swell_id, tide_id, wind_id
    ),
    removed_temps AS (
      DELETE FROM ${temps} WHERE temp_id IN (SELECT temp_id FROM removed)
    ),
    removed_swells AS (
      DELETE FROM ${swells} WHERE swell_id IN (SELECT swell_id FROM removed)
    ),
    removed_tides AS (
      DELETE FROM ${tides} WHERE tide_id IN (SELECT tide_id FROM removed)
    ),
    removed_winds AS (
      DELETE FROM ${winds} WHERE wind_id IN (SELECT wind_id FROM removed)
    )
    SELECT count(*) FROM removed
  `);
}

export const sessionsAtLocation = (locationId: number) => eq(sessionInfo.locId, locationId);
export const sessionsOfUser = (userId: number) => eq(sessionInfo.userId, userId);
