import type { Id, Swell, Temperature, Tide, Wind } from '@surflog/protocol';

export type InsertTemperatureInput = Omit<Temperature, 'id'>;
export type InsertSwellInput = Omit<Swell, 'id'>;
export type InsertTideInput = Omit<Tide, 'id'>;
export type InsertWindInput = Omit<Wind, 'id'>;

/**
 * Repository interface shared by the per-session reading tables.
 *
 * Every insert creates a fresh row with a newly generated id; rows are
 * never looked up by value.
 */
export interface ConditionRepository<TRow, TInput> {
  insert(input: TInput): Promise<TRow>;

  get(id: Id): Promise<TRow | null>;
}

export type TemperatureRepository = ConditionRepository<Temperature, InsertTemperatureInput>;
export type SwellRepository = ConditionRepository<Swell, InsertSwellInput>;
export type TideRepository = ConditionRepository<Tide, InsertTideInput>;
export type WindRepository = ConditionRepository<Wind, InsertWindInput>;
