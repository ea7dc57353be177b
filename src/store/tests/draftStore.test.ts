import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { randomUUID } from 'crypto';
import { IDBKeyRange, indexedDB } from 'fake-indexeddb';
import { createDraftStore, type DraftStore } from '../draftStore';
import { DexieDraftRepository, type DraftRepository } from '../../services/database';
import { AppError, ConfigurationError, DraftError } from '../../utils/errorHandler';
import { makeHitter, smallLeague, smallPool } from '../../test/playerFactory';

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) expect(error.code).toBe(code);
    return;
  }
  throw new Error(`expected an error with code ${code}`);
}

describe('draft store', () => {
  let inner: DexieDraftRepository;
  let failNextSave: boolean;
  let repository: DraftRepository;
  let store: DraftStore;

  beforeEach(async () => {
    inner = new DexieDraftRepository(`test-${randomUUID()}`, { indexedDB, IDBKeyRange });
    failNextSave = false;
    repository = {
      loadSnapshot: () => inner.loadSnapshot(),
      replacePool: (players, teams) => inner.replacePool(players, teams),
      recordPick: pick => inner.recordPick(pick),
      removePick: pickId => inner.removePick(pickId),
      saveEpoch: epoch => {
        if (failNextSave) {
          failNextSave = false;
          return Promise.reject(new Error('disk full'));
        }
        return inner.saveEpoch(epoch);
      },
      loadEpoch: () => inner.loadEpoch(),
      clearDraft: () => inner.clearDraft()
    };
    store = createDraftStore({ repository, settings: smallLeague });
    await store.getState().initializeDraft(smallPool(), ['Sharks']);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await inner.db.delete();
  });

  describe('initializeDraft', () => {
    it('should create the teams and value the pool', () => {
      const state = store.getState();

      expect(state.teams.map(t => [t.id, t.name, t.isUserTeam])).toEqual([
        ['team-1', 'Sharks', true],
        ['team-2', 'Team 2', false]
      ]);
      expect(state.sequence).toBe(0);
      expect(state.valuation?.epoch).toBe(0);
      expect(state.getValue('of10')).toBe(state.valuation?.values.of10.dollarValue);
    });

    it('should reject duplicate player ids', async () => {
      const pool = [makeHitter('dup', ['C'], 1), makeHitter('dup', ['OF'], 2)];
      await expect(store.getState().initializeDraft(pool)).rejects.toThrow('Duplicate player id dup');
    });
  });

  it('should reject invalid settings when the store is created', () => {
    expect(() => createDraftStore({ repository, settings: { ...smallLeague, minBid: -1 } })).toThrow(ConfigurationError);
  });

  it('should not serve values before the first valuation', () => {
    const fresh = createDraftStore({ repository, settings: smallLeague });
    expectCode(() => fresh.getState().getValue('of10'), 'VALUES_NOT_READY');
  });

  describe('draftPlayer', () => {
    it('should record the pick and revalue the rest of the pool', async () => {
      const before = store.getState().valuation;
      const pick = await store.getState().draftPlayer('of10', 'team-1', 20);
      const state = store.getState();

      expect(pick.pickNumber).toBe(1);
      expect(state.sequence).toBe(1);
      expect(state.valuation?.epoch).toBe(1);
      expect(state.valuation?.values.of10).toBeUndefined();
      expect(state.players.find(p => p.id === 'of10')?.isDrafted).toBe(true);
      // Drafted players keep the value they had when picked
      expect(state.getValue('of10')).toBe(before?.values.of10.dollarValue);
      expect(state.valuation?.budgets.hitter).toBeCloseTo(120, 8);
    });

    it('should track team budgets and the maximum bid', async () => {
      expect(store.getState().getTeamBudget('team-1')).toEqual({
        teamId: 'team-1',
        spent: 0,
        remaining: 100,
        openSlots: 10,
        reserved: 9,
        maxBid: 91
      });

      await store.getState().draftPlayer('of10', 'team-1', 20);

      expect(store.getState().getTeamBudget('team-1')).toEqual({
        teamId: 'team-1',
        spent: 20,
        remaining: 80,
        openSlots: 9,
        reserved: 8,
        maxBid: 72
      });
      expect(store.getState().getRemainingBudget()).toBe(180);
    });

    it('should reject invalid picks', async () => {
      const { draftPlayer } = store.getState();

      await expect(draftPlayer('nobody', 'team-1', 5)).rejects.toThrow('Player nobody not found');
      await expect(draftPlayer('of10', 'team-9', 5)).rejects.toThrow('Team team-9 not found');
      await expect(draftPlayer('of10', 'team-1', 0)).rejects.toThrow('Price must be at least $1');
      await expect(draftPlayer('of10', 'team-1', 92)).rejects.toThrow(
        'Team team-1 can bid at most $91 (tried to spend $92)'
      );

      await draftPlayer('of10', 'team-1', 5);
      await expect(draftPlayer('of10', 'team-2', 5)).rejects.toThrow(DraftError);
      expect(store.getState().sequence).toBe(1);
    });

    it('should reject picks once a roster is full', async () => {
      const ids = ['c1', 'c2', 'fb1', 'fb2', 'ss1', 'of1', 'of2', 'of3', 'sp1', 'sp2', 'rp1'];
      for (const id of ids) {
        await store.getState().draftPlayer(id, 'team-2', 1);
      }

      // The bench pick needed no reserve; everything left is biddable
      expect(store.getState().getTeamBudget('team-2')).toEqual({
        teamId: 'team-2',
        spent: 11,
        remaining: 89,
        openSlots: 0,
        reserved: 0,
        maxBid: 89
      });
      await expect(store.getState().draftPlayer('of4', 'team-2', 1)).rejects.toThrow('Roster for team team-2 is full');
    });

    it('should apply concurrent picks one at a time', async () => {
      const { draftPlayer } = store.getState();

      const results = await Promise.allSettled([
        draftPlayer('of10', 'team-1', 10),
        draftPlayer('of10', 'team-2', 12)
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(store.getState().draftHistory).toHaveLength(1);
      expect(store.getState().draftHistory[0].teamId).toBe('team-1');
    });
  });

  describe('undo', () => {
    it('should restore the values from before the pick', async () => {
      const before = store.getState().valuation?.values;

      await store.getState().draftPlayer('c6', 'team-2', 15);
      const restored = await store.getState().undoLastPick();

      expect(restored?.id).toBe('c6');
      expect(restored?.isDrafted).toBe(false);
      expect(store.getState().sequence).toBe(2);
      expect(store.getState().valuation?.values).toEqual(before);
    });

    it('should undo a pick out of order', async () => {
      const first = await store.getState().draftPlayer('of10', 'team-1', 10);
      await store.getState().draftPlayer('c6', 'team-2', 10);

      const restored = await store.getState().undoPick(first.id);

      expect(restored?.id).toBe('of10');
      const state = store.getState();
      expect(state.draftHistory.map(p => p.playerId)).toEqual(['c6']);
      expect(state.players.find(p => p.id === 'c6')?.isDrafted).toBe(true);
      expect(state.valuation?.values.of10).toBeDefined();
    });

    it('should do nothing without picks', async () => {
      expect(await store.getState().undoLastPick()).toBeUndefined();
      expect(await store.getState().undoPick('missing')).toBeUndefined();
      expect(store.getState().sequence).toBe(0);
    });
  });

  it('should list the most recent picks first', async () => {
    await store.getState().draftPlayer('of10', 'team-1', 10);
    await store.getState().draftPlayer('c6', 'team-2', 8);
    await store.getState().draftPlayer('sp8', 'team-1', 6);

    expect(store.getState().getDraftHistory().map(p => p.playerId)).toEqual(['sp8', 'c6', 'of10']);
    expect(store.getState().getDraftHistory(1).map(p => p.playerId)).toEqual(['sp8']);
  });

  it('should reset every pick', async () => {
    const before = store.getState().valuation?.values;
    await store.getState().draftPlayer('of10', 'team-1', 10);

    await store.getState().resetDraft();

    const state = store.getState();
    expect(state.draftHistory).toEqual([]);
    expect(state.players.every(p => !p.isDrafted)).toBe(true);
    expect(state.sequence).toBe(2);
    expect(state.valuation?.values).toEqual(before);
  });

  it('should resume a stored draft', async () => {
    await store.getState().draftPlayer('of10', 'team-1', 10);
    const expected = store.getState().valuation;

    const resumed = createDraftStore({ repository, settings: smallLeague });
    const epoch = await resumed.getState().loadDraft();

    expect(epoch).toEqual(expected);
    expect(resumed.getState().draftHistory).toHaveLength(1);
  });

  it('should recalculate a stored draft when the league settings changed', async () => {
    await store.getState().draftPlayer('of10', 'team-1', 10);
    const stored = store.getState().valuation;

    const richer = createDraftStore({ repository, settings: { ...smallLeague, budgetPerTeam: 200 } });
    const epoch = await richer.getState().loadDraft();

    expect(epoch.epoch).toBe(1);
    expect(epoch.settingsKey).not.toBe(stored?.settingsKey);
    // (2 x 200) x 0.7 less the $10 pick
    expect(epoch.budgets.hitter).toBeCloseTo(270, 8);
    expect(richer.getState().getValue('of9')).toBeGreaterThan(stored?.values.of9.dollarValue ?? Infinity);
    expect(await inner.loadEpoch()).toEqual(epoch);
  });

  it('should recalculate a stored draft when the valuation mode changed', async () => {
    const global = createDraftStore({ repository, settings: smallLeague, mode: 'global' });
    const epoch = await global.getState().loadDraft();

    expect(epoch.mode).toBe('global');
    expect(epoch.values.c6.baselineKey).toBe('hitter');
  });

  describe('failed recalculation', () => {
    it('should mark values stale until they are refreshed', async () => {
      const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
      const before = store.getState().valuation?.values;
      failNextSave = true;

      await expect(store.getState().draftPlayer('of10', 'team-1', 10)).rejects.toThrow(
        '[DraftStore.recalculate] disk full'
      );

      const stale = store.getState();
      expect(logged).toHaveBeenCalledTimes(1);
      expect(stale.valuesStale).toBe(true);
      expect(stale.sequence).toBe(1);
      expectCode(() => stale.getValue('c6'), 'VALUES_NOT_READY');
      expect(stale.getValue('of10')).toBe(before?.values.of10.dollarValue);

      await store.getState().refreshValues();

      const fresh = store.getState();
      expect(fresh.valuesStale).toBe(false);
      expect(fresh.valuation?.epoch).toBe(1);
      expect(fresh.getValue('c6')).toBe(fresh.valuation?.values.c6.dollarValue);
    });
  });
});
