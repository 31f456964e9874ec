import { eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { temps, swells, tides, winds } from '../schema/index.js';
import type {
  TemperatureRepository,
  SwellRepository,
  TideRepository,
  WindRepository,
  InsertTemperatureInput,
  InsertSwellInput,
  InsertTideInput,
  InsertWindInput,
} from '../../interfaces/index.js';
import type { Id, Swell, Temperature, Tide, Wind } from '@surflog/protocol';

export class PgTemperatureRepository implements TemperatureRepository {
  constructor(private db: DbExecutor) {}

  async insert(input: InsertTemperatureInput): Promise<Temperature> {
    const [row] = await this.db
      .insert(temps)
      .values({ airTemp: input.airTemp, waterTemp: input.waterTemp })
      .returning();
    return row;
  }

  async get(id: Id): Promise<Temperature | null> {
    const [row] = await this.db.select().from(temps).where(eq(temps.id, id));
    return row ?? null;
  }
}

export class PgSwellRepository implements SwellRepository {
  constructor(private db: DbExecutor) {}

  async insert(input: InsertSwellInput): Promise<Swell> {
    const [row] = await this.db
      .insert(swells)
      .values({
        meanWaveDir: input.meanWaveDir,
        meanWaveDirCardinal: input.meanWaveDirCardinal,
        meanWaveHeight: input.meanWaveHeight,
        domPeriod: input.domPeriod,
      })
      .returning();
    return row;
  }

  async get(id: Id): Promise<Swell | null> {
    const [row] = await this.db.select().from(swells).where(eq(swells.id, id));
    return row ?? null;
  }
}

export class PgTideRepository implements TideRepository {
  constructor(private db: DbExecutor) {}

  async insert(input: InsertTideInput): Promise<Tide> {
    const [row] = await this.db
      .insert(tides)
      .values({
        incoming: input.incoming,
        maximumHeight: input.maxHeight,
        minimumHeight: input.minHeight,
        medianHeight: input.medianHeight,
      })
      .returning();
    return this.rowToTide(row);
  }

  async get(id: Id): Promise<Tide | null> {
    const [row] = await this.db.select().from(tides).where(eq(tides.id, id));
    return row ? this.rowToTide(row) : null;
  }

  private rowToTide(row: typeof tides.$inferSelect): Tide {
    return {
      id: row.id,
      incoming: row.incoming,
      maxHeight: row.maximumHeight,
      minHeight: row.minimumHeight,
      medianHeight: row.medianHeight,
    };
  }
}

export class PgWindRepository implements WindRepository {
  constructor(private db: DbExecutor) {}

  async insert(input: InsertWindInput): Promise<Wind> {
    const [row] = await this.db
      .insert(winds)
      .values({
        meanWindDir: input.meanWindDir,
        meanWindDirCardinal: input.meanWindDirCardinal,
        meanWindSpeed: input.meanWindSpeed,
        gustSpeed: input.gustSpeed,
      })
      .returning();
    return row;
  }

  async get(id: Id): Promise<Wind | null> {
    const [row] = await this.db.select().from(winds).where(eq(winds.id, id));
    return row ?? null;
  }
}
