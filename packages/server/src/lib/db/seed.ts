// Starter data for development
//
// The three Newport spots the log started with, all reported by NDBC buoy
// 46050, plus a development user to submit sessions as.

import type { Location, User } from '@surflog/protocol';
import type { CreateLocationInput, RepositoryContext } from '@surflog/repositories';

export const STARTER_LOCATIONS: readonly CreateLocationInput[] = [
  { name: 'Agate Beach', buoyNumber: 46050, latitude: 44.674131, longitude: -124.063319 },
  { name: 'Otter Rock', buoyNumber: 46050, latitude: 44.746325, longitude: -124.062164 },
  { name: 'South Beach', buoyNumber: 46050, latitude: 44.600865, longitude: -124.066266 },
];

export const DEV_USERNAME = 'dev-surfer';

export type SeedOptions = {
  /** Username of the development user (default: dev-surfer) */
  username?: string;
};

export type SeedResult = {
  locations: Location[];
  user: User;
};

/**
 * Create the starter locations and the development user.
 * Rows that already exist by name are left untouched, so seeding twice is safe.
 */
export async function seedStarterData(
  repos: RepositoryContext,
  options: SeedOptions = {}
): Promise<SeedResult> {
  const locations: Location[] = [];
  for (const input of STARTER_LOCATIONS) {
    const existing = await repos.locations.findByName(input.name);
    locations.push(existing ?? (await repos.locations.create(input)));
  }

  const username = options.username ?? DEV_USERNAME;
  const user =
    (await repos.users.findByUsername(username)) ??
    (await repos.users.create({ username, passkey: 'dev-passkey' }));

  return { locations, user };
}
