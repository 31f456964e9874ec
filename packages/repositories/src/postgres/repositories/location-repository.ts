import { eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { locations } from '../schema/index.js';
import type { LocationRepository, CreateLocationInput } from '../../interfaces/index.js';
import type { Id, Location } from '@surflog/protocol';
import { deleteSessionsCascade, sessionsAtLocation } from './cascade.js';

export class PgLocationRepository implements LocationRepository {
  constructor(private db: DbExecutor) {}

  async create(input: CreateLocationInput): Promise<Location> {
    const [row] = await this.db
      .insert(locations)
      .values({
        spotName: input.name,
        buoyNum: input.buoyNumber,
        lat: input.latitude ?? null,
        long: input.longitude ?? null,
      })
      .returning();

    return this.rowToLocation(row);
  }

  async get(id: Id): Promise<Location | null> {
    const [row] = await this.db.select().from(locations).where(eq(locations.id, id));
    return row ? this.rowToLocation(row) : null;
  }

  async findByName(name: string): Promise<Location | null> {
    const [row] = await this.db.select().from(locations).where(eq(locations.spotName, name));
    return row ? this.rowToLocation(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      // FOR UPDATE blocks concurrent session inserts that reference this row
      const [locked] = await tx
        .select({ id: locations.id })
        .from(locations)
        .where(eq(locations.id, id))
        .for('update');
      if (!locked) return false;

      await deleteSessionsCascade(tx, sessionsAtLocation(id));
      await tx.delete(locations).where(eq(locations.id, id));
      return true;
    });
  }

  private rowToLocation(row: typeof locations.$inferSelect): Location {
    return {
      id: row.id,
      name: row.spotName,
      buoyNumber: row.buoyNum,
      latitude: row.lat,
      longitude: row.long,
    };
  }
}
