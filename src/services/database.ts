import Dexie, { type Table } from 'dexie';
import {
  DraftPick,
  Player,
  PlayerValuation,
  PoolSnapshot,
  Team,
  ValuationEpoch
} from '../types';
import { DraftError, TransactionConflictError } from '../utils/errorHandler';

/**
 * Storage the draft session needs. Every method commits atomically: a reader
 * sees either all of a write or none of it.
 */
export interface DraftRepository {
  loadSnapshot(): Promise<PoolSnapshot>;
  replacePool(players: Player[], teams: Team[]): Promise<void>;
  recordPick(pick: DraftPick): Promise<number>;
  removePick(pickId: string): Promise<{ pick: DraftPick; sequence: number } | undefined>;
  saveEpoch(epoch: ValuationEpoch): Promise<void>;
  loadEpoch(): Promise<ValuationEpoch | undefined>;
  clearDraft(): Promise<number>;
}

type EpochMeta = Omit<ValuationEpoch, 'values'>;

interface DraftStateRecord {
  id: 'current';
  sequence: number;
  epoch?: EpochMeta;
}

type DexieOptions = ConstructorParameters<typeof Dexie>[1];

export class ValuationDatabase extends Dexie {
  players!: Table<Player, string>;
  teams!: Table<Team, string>;
  draftPicks!: Table<DraftPick, string>;
  valuations!: Table<PlayerValuation, string>;
  draftState!: Table<DraftStateRecord, string>;

  constructor(name: string, options?: DexieOptions) {
    super(name, options);

    this.version(1).stores({
      players: 'id, name, playerType, team',
      teams: 'id',
      draftPicks: 'id, &playerId, teamId, pickNumber',
      valuations: 'playerId',
      draftState: 'id'
    });
  }
}

export class DexieDraftRepository implements DraftRepository {
  readonly db: ValuationDatabase;

  constructor(name: string = 'AuctionValuationDB', options?: DexieOptions) {
    this.db = new ValuationDatabase(name, options);
  }

  async loadSnapshot(): Promise<PoolSnapshot> {
    const db = this.db;
    return db.transaction('r', [db.players, db.teams, db.draftPicks, db.draftState], async () => {
      const [players, teams, picks, state] = await Promise.all([
        db.players.toArray(),
        db.teams.toArray(),
        db.draftPicks.orderBy('pickNumber').toArray(),
        db.draftState.get('current')
      ]);
      return { players, teams, picks, sequence: state?.sequence ?? 0 };
    });
  }

  async replacePool(players: Player[], teams: Team[]): Promise<void> {
    const db = this.db;
    await db.transaction('rw', [db.players, db.teams, db.draftPicks, db.valuations, db.draftState], async () => {
      await Promise.all([
        db.players.clear(),
        db.teams.clear(),
        db.draftPicks.clear(),
        db.valuations.clear()
      ]);
      await db.players.bulkPut(players.map(p => ({ ...p, isDrafted: false })));
      await db.teams.bulkPut(teams);
      await db.draftState.put({ id: 'current', sequence: 0 });
    });
  }

  async recordPick(pick: DraftPick): Promise<number> {
    const db = this.db;
    return db.transaction('rw', [db.players, db.draftPicks, db.draftState], async () => {
      const player = await db.players.get(pick.playerId);
      if (!player) {
        throw new DraftError(`Player ${pick.playerId} not found`);
      }
      if (player.isDrafted) {
        throw new DraftError(`${player.name} has already been drafted`);
      }

      await db.players.update(pick.playerId, { isDrafted: true });
      await db.draftPicks.add(pick);
      return this.bumpSequence();
    });
  }

  async removePick(pickId: string): Promise<{ pick: DraftPick; sequence: number } | undefined> {
    const db = this.db;
    return db.transaction('rw', [db.players, db.draftPicks, db.draftState], async () => {
      const pick = await db.draftPicks.get(pickId);
      if (!pick) return undefined;

      await db.players.update(pick.playerId, { isDrafted: false });
      await db.draftPicks.delete(pickId);
      const sequence = await this.bumpSequence();
      return { pick, sequence };
    });
  }

  /**
   * Replace all stored valuations with the epoch's. Rejected when a newer
   * transaction has been committed since the epoch's snapshot was read.
   */
  async saveEpoch(epoch: ValuationEpoch): Promise<void> {
    const db = this.db;
    await db.transaction('rw', [db.valuations, db.draftState], async () => {
      const state = await db.draftState.get('current');
      const sequence = state?.sequence ?? 0;
      if (sequence !== epoch.epoch) {
        throw new TransactionConflictError(
          `Epoch ${epoch.epoch} is stale; storage is at transaction ${sequence}`,
          sequence,
          epoch.epoch
        );
      }

      const { values, ...meta } = epoch;
      await db.valuations.clear();
      await db.valuations.bulkPut(Object.values(values));
      await db.draftState.put({ id: 'current', sequence, epoch: meta });
    });
  }

  async loadEpoch(): Promise<ValuationEpoch | undefined> {
    const db = this.db;
    return db.transaction('r', [db.valuations, db.draftState], async () => {
      const state = await db.draftState.get('current');
      if (!state?.epoch) return undefined;

      const values: Record<string, PlayerValuation> = {};
      for (const valuation of await db.valuations.toArray()) {
        values[valuation.playerId] = valuation;
      }
      return { ...state.epoch, values };
    });
  }

  /**
   * Undo every pick and drop stored values; players and teams stay
   */
  async clearDraft(): Promise<number> {
    const db = this.db;
    return db.transaction('rw', [db.players, db.draftPicks, db.valuations, db.draftState], async () => {
      await db.players.toCollection().modify({ isDrafted: false });
      await db.draftPicks.clear();
      await db.valuations.clear();
      return this.bumpSequence();
    });
  }

  private async bumpSequence(): Promise<number> {
    const state = await this.db.draftState.get('current');
    const sequence = (state?.sequence ?? 0) + 1;
    await this.db.draftState.put({ id: 'current', sequence });
    return sequence;
  }
}
