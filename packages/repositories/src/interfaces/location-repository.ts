import type { Id, Location } from '@surflog/protocol';

/**
 * Input for creating a Location (seeding and administration only)
 */
export type CreateLocationInput = {
  name: string;
  buoyNumber: number;
  latitude?: number | null;
  longitude?: number | null;
};

/**
 * Repository interface for Location operations.
 *
 * Locations are reference data. Ingestion only reads them, resolving a
 * spot name to an id; it never creates one.
 */
export interface LocationRepository {
  /**
   * Create a new Location.
   * Fails if another location already has the same name.
   */
  create(input: CreateLocationInput): Promise<Location>;

  /**
   * Get a Location by ID
   * @returns Location or null if not found
   */
  get(id: Id): Promise<Location | null>;

  /**
   * Resolve a spot name by exact, case-sensitive match.
   * @returns Location or null if no location has that name
   */
  findByName(name: string): Promise<Location | null>;

  /**
   * Delete a Location together with every session logged there and those
   * sessions' temperature, swell, tide and wind rows.
   * @returns true if the location existed
   */
  delete(id: Id): Promise<boolean>;
}
