// Tests for the in-memory repository context
// Verifies lookups, transactional commit/rollback, isolation and cascade deletes.

import { describe, it, expect, beforeEach } from 'vitest';
import type { Location, User } from '@surflog/protocol';
import type { RepositoryContext } from '../interfaces/index.js';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from './index.js';

async function logSession(repos: RepositoryContext, location: Location, user: User, rating = 3) {
  const temperature = await repos.temperatures.insert({ airTemp: 11, waterTemp: 10 });
  const swell = await repos.swells.insert({
    meanWaveDir: 280,
    meanWaveDirCardinal: 'W',
    meanWaveHeight: 1.5,
    domPeriod: 11,
  });
  const tide = await repos.tides.insert({
    incoming: true,
    maxHeight: 2.1,
    minHeight: 0.3,
    medianHeight: null,
  });
  const wind = await repos.winds.insert({
    meanWindDir: 10,
    meanWindDirCardinal: 'N',
    meanWindSpeed: 8,
    gustSpeed: 12,
  });
  return repos.sessions.insert({
    locationId: location.id,
    temperatureId: temperature.id,
    swellId: swell.id,
    tideId: tide.id,
    windId: wind.id,
    userId: user.id,
    date: '2024-03-02',
    timeIn: '07:00:00',
    timeOut: '08:30:00',
    notes: null,
    rating,
  });
}

function rowCounts(repos: InMemoryRepositoryContext) {
  const { locations, users, temperatures, swells, tides, winds, sessions } = repos._data;
  return {
    locations: locations.size,
    users: users.size,
    temperatures: temperatures.size,
    swells: swells.size,
    tides: tides.size,
    winds: winds.size,
    sessions: sessions.size,
  };
}

describe('InMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;
  let agate: Location;
  let otter: Location;
  let surfer: User;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    agate = await repos.locations.create({
      name: 'Agate Beach',
      buoyNumber: 46050,
      latitude: 44.674131,
      longitude: -124.063319,
    });
    otter = await repos.locations.create({ name: 'Otter Rock', buoyNumber: 46050 });
    surfer = await repos.users.create({ username: 'test-surfer', passkey: 'test-secret' });
  });

  describe('reference data', () => {
    it('assigns sequential ids per table', () => {
      expect(agate.id).toBe(1);
      expect(otter.id).toBe(2);
      expect(surfer.id).toBe(1);
    });

    it('defaults optional columns to null', () => {
      expect(otter.latitude).toBeNull();
      expect(otter.longitude).toBeNull();
      expect(surfer.email).toBeNull();
    });

    it('resolves names by exact match only', async () => {
      expect(await repos.locations.findByName('Agate Beach')).toEqual(agate);
      expect(await repos.locations.findByName('agate beach')).toBeNull();
      expect(await repos.locations.findByName('Agate Beach ')).toBeNull();
      expect(await repos.users.findByUsername('test-surfer')).toEqual(surfer);
      expect(await repos.users.findByUsername('nobody')).toBeNull();
    });

    it('rejects duplicate names', async () => {
      await expect(
        repos.locations.create({ name: 'Agate Beach', buoyNumber: 1 })
      ).rejects.toThrow('duplicate location name: Agate Beach');
      await expect(
        repos.users.create({ username: 'test-surfer', passkey: 'other' })
      ).rejects.toThrow('duplicate username: test-surfer');
    });
  });

  describe('condition rows', () => {
    it('inserts a fresh row for identical readings', async () => {
      const first = await repos.temperatures.insert({ airTemp: 12.5, waterTemp: 9.8 });
      const second = await repos.temperatures.insert({ airTemp: 12.5, waterTemp: 9.8 });

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(repos._data.temperatures.size).toBe(2);
    });
  });

  describe('sessions', () => {
    it('links a session to its location, user and readings', async () => {
      const session = await logSession(repos, agate, surfer);

      expect(await repos.sessions.get(session.id)).toEqual({
        id: 1,
        locationId: agate.id,
        temperatureId: 1,
        swellId: 1,
        tideId: 1,
        windId: 1,
        userId: surfer.id,
        date: '2024-03-02',
        timeIn: '07:00:00',
        timeOut: '08:30:00',
        notes: null,
        rating: 3,
      });
    });

    it('rejects a session whose references do not exist', async () => {
      await expect(
        repos.sessions.insert({
          locationId: agate.id,
          temperatureId: 99,
          swellId: 99,
          tideId: 99,
          windId: 99,
          userId: surfer.id,
          date: '2024-03-02',
          timeIn: '07:00:00',
          timeOut: '08:00:00',
          notes: null,
          rating: 1,
        })
      ).rejects.toThrow(
        'insert on table "session_info" violates foreign key constraint: temp_id=99 does not exist'
      );
      expect(repos._data.sessions.size).toBe(0);
    });
  });

  describe('transaction', () => {
    it('commits every write when the function resolves', async () => {
      const session = await repos.transaction((tx) => logSession(tx, agate, surfer));

      expect(rowCounts(repos)).toEqual({
        locations: 2,
        users: 1,
        temperatures: 1,
        swells: 1,
        tides: 1,
        winds: 1,
        sessions: 1,
      });
      expect(await repos.sessions.get(session.id)).not.toBeNull();
    });

    it('rolls back every write and rethrows when the function rejects', async () => {
      const failure = new Error('disk full');

      await expect(
        repos.transaction(async (tx) => {
          await tx.temperatures.insert({ airTemp: 1, waterTemp: 2 });
          await tx.swells.insert({
            meanWaveDir: 1,
            meanWaveDirCardinal: 'N',
            meanWaveHeight: 1,
            domPeriod: 1,
          });
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(repos._data.temperatures.size).toBe(0);
      expect(repos._data.swells.size).toBe(0);
    });

    it('hides staged rows from readers outside the transaction', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let stagedId = 0;

      const pending = repos.transaction(async (tx) => {
        const row = await tx.temperatures.insert({ airTemp: 5, waterTemp: 6 });
        stagedId = row.id;
        await gate;
        return row;
      });

      // Let the transaction run up to the gate
      await new Promise((resolve) => setTimeout(resolve, 0));
      expect(stagedId).toBe(1);
      expect(await repos.temperatures.get(stagedId)).toBeNull();

      release();
      await pending;
      expect(await repos.temperatures.get(stagedId)).toEqual({ id: 1, airTemp: 5, waterTemp: 6 });
    });

    it('serializes concurrent transactions without losing writes', async () => {
      const results = await Promise.all([
        repos.transaction((tx) => logSession(tx, agate, surfer, 1)),
        repos.transaction((tx) => logSession(tx, otter, surfer, 2)),
        repos.transaction((tx) => logSession(tx, agate, surfer, 3)),
      ]);

      expect(results.map((s) => s.id)).toEqual([1, 2, 3]);
      expect(results.map((s) => s.temperatureId)).toEqual([1, 2, 3]);
      expect(repos._data.sessions.size).toBe(3);
      expect(repos._data.winds.size).toBe(3);
    });

    it('keeps running queued transactions after one rolls back', async () => {
      const failed = repos.transaction(async () => {
        throw new Error('boom');
      });
      const succeeded = repos.transaction((tx) => logSession(tx, agate, surfer));

      await expect(failed).rejects.toThrow('boom');
      await expect(succeeded).resolves.toMatchObject({ id: 1 });
    });

    it('queues writes made outside a transaction behind open transactions', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const pending = repos.transaction(async (tx) => {
        const session = await logSession(tx, agate, surfer);
        await gate;
        return session;
      });
      const deletion = repos.locations.delete(agate.id);

      release();
      await pending;
      expect(await deletion).toBe(true);

      // The delete ran after the commit, so it cascaded over the new session
      expect(repos._data.sessions.size).toBe(0);
      expect(repos._data.temperatures.size).toBe(0);
    });
  });

  describe('cascade delete', () => {
    it('removes a location, its sessions and their readings', async () => {
      await logSession(repos, agate, surfer);
      await logSession(repos, agate, surfer);
      const kept = await logSession(repos, otter, surfer);

      expect(await repos.locations.delete(agate.id)).toBe(true);

      expect(await repos.locations.get(agate.id)).toBeNull();
      expect(Array.from(repos._data.sessions.keys())).toEqual([kept.id]);
      expect(Array.from(repos._data.temperatures.keys())).toEqual([kept.temperatureId]);
      expect(Array.from(repos._data.swells.keys())).toEqual([kept.swellId]);
      expect(Array.from(repos._data.tides.keys())).toEqual([kept.tideId]);
      expect(Array.from(repos._data.winds.keys())).toEqual([kept.windId]);
    });

    it('affects no other table when the location has no sessions', async () => {
      await logSession(repos, agate, surfer);
      const before = rowCounts(repos);

      expect(await repos.locations.delete(otter.id)).toBe(true);

      expect(rowCounts(repos)).toEqual({ ...before, locations: before.locations - 1 });
    });

    it('removes a user, their sessions and their readings', async () => {
      const other = await repos.users.create({ username: 'other-surfer', passkey: 'test-secret' });
      await logSession(repos, agate, surfer);
      const kept = await logSession(repos, otter, other);

      expect(await repos.users.delete(surfer.id)).toBe(true);

      expect(Array.from(repos._data.sessions.keys())).toEqual([kept.id]);
      expect(repos._data.temperatures.size).toBe(1);
      expect(repos._data.locations.size).toBe(2);
    });

    it('returns false for an unknown id', async () => {
      expect(await repos.locations.delete(404)).toBe(false);
      expect(await repos.users.delete(404)).toBe(false);
    });
  });

  describe('clear', () => {
    it('empties every table and restarts ids', async () => {
      await logSession(repos, agate, surfer);

      repos.clear();

      expect(rowCounts(repos)).toEqual({
        locations: 0,
        users: 0,
        temperatures: 0,
        swells: 0,
        tides: 0,
        winds: 0,
        sessions: 0,
      });
      const again = await repos.locations.create({ name: 'South Beach', buoyNumber: 46050 });
      expect(again.id).toBe(1);
    });
  });
});
