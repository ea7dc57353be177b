import { randomUUID } from 'crypto';
import { createStore } from 'zustand/vanilla';
import {
  DraftPick,
  Player,
  PlayerValuation,
  Team,
  ValuationEpoch,
  ValuationMode
} from '../types';
import { DraftRepository } from '../services/database';
import {
  ALL_SLOTS,
  LeagueSettings,
  hitterRosterSpots,
  pitcherRosterSpots,
  validateLeagueSettings
} from '../services/valuation/leagueSettings';
import { recalculate, settingsFingerprint } from '../services/valuation/recalculationCoordinator';
import { AppError, DraftError, handleError, logError } from '../utils/errorHandler';
import { isDebugMode } from '../config/featureFlags';

export interface TeamBudget {
  teamId: string;
  spent: number;
  remaining: number;
  openSlots: number;   // active (non-bench) slots still to fill
  reserved: number;    // min bids held back for the other open slots
  maxBid: number;
}

export interface DraftState {
  // Committed data
  settings: LeagueSettings;
  players: Player[];
  teams: Team[];
  draftHistory: DraftPick[];   // pick order
  sequence: number;

  // Latest valuation epoch; stale when the last recalculation failed
  valuation?: ValuationEpoch;
  valuesStale: boolean;

  // Actions
  initializeDraft: (players: Player[], teamNames?: string[]) => Promise<ValuationEpoch>;
  loadDraft: () => Promise<ValuationEpoch>;
  draftPlayer: (playerId: string, teamId: string, price: number) => Promise<DraftPick>;
  undoLastPick: () => Promise<Player | undefined>;
  undoPick: (pickId: string) => Promise<Player | undefined>;
  resetDraft: () => Promise<ValuationEpoch>;
  refreshValues: () => Promise<ValuationEpoch>;

  // Reads
  getValuation: (playerId: string) => PlayerValuation;
  getValue: (playerId: string) => number;
  getDraftHistory: (limit?: number) => DraftPick[];
  getTeamBudget: (teamId: string) => TeamBudget;
  getRemainingBudget: () => number;
}

export interface DraftStoreOptions {
  repository: DraftRepository;
  settings: LeagueSettings;
  mode?: ValuationMode;
}

const createInitialTeams = (settings: LeagueSettings, teamNames: string[] = []): Team[] => {
  const teams: Team[] = [];
  for (let i = 0; i < settings.numTeams; i++) {
    teams.push({
      id: `team-${i + 1}`,
      name: teamNames[i] ?? (i === 0 ? 'My Team' : `Team ${i + 1}`),
      budget: settings.budgetPerTeam,
      isUserTeam: i === 0
    });
  }
  return teams;
};

const rosterSize = (settings: LeagueSettings): number =>
  ALL_SLOTS.reduce((sum, slot) => sum + (settings.rosterSpots[slot] ?? 0), 0);

const activeRosterSize = (settings: LeagueSettings): number =>
  hitterRosterSpots(settings) + pitcherRosterSpots(settings);

/**
 * Draft session store. Every pick or undo is committed to the repository and
 * followed by a full recalculation before the next transaction starts.
 */
export const createDraftStore = (options: DraftStoreOptions) => {
  const { repository } = options;
  const settings = validateLeagueSettings(options.settings);

  // Serializes transactions. A failed task rejects its own promise only;
  // the chain itself keeps going.
  let queue: Promise<unknown> = Promise.resolve();
  const exclusive = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  return createStore<DraftState>((set, get) => {
    const commitValuation = async (expectedSequence: number): Promise<ValuationEpoch> => {
      const snapshot = await repository.loadSnapshot();
      set({
        players: snapshot.players,
        teams: snapshot.teams,
        draftHistory: snapshot.picks,
        sequence: snapshot.sequence
      });

      try {
        const epoch = recalculate(snapshot, settings, { mode: options.mode, expectedSequence });
        await repository.saveEpoch(epoch);
        set({ valuation: epoch, valuesStale: false });
        return epoch;
      } catch (error) {
        const appError = handleError(error, 'DraftStore.recalculate');
        logError(appError, { sequence: snapshot.sequence });
        set({ valuesStale: true });
        throw appError;
      }
    };

    const findTeam = (teamId: string): Team => {
      const team = get().teams.find(t => t.id === teamId);
      if (!team) {
        throw new DraftError(`Team ${teamId} not found`);
      }
      return team;
    };

    const teamBudget = (teamId: string): TeamBudget => {
      const team = findTeam(teamId);
      const picks = get().draftHistory.filter(p => p.teamId === teamId);
      const spent = picks.reduce((sum, p) => sum + p.price, 0);
      const remaining = team.budget - spent;
      const openSlots = Math.max(0, activeRosterSize(settings) - picks.length);
      // Keep the minimum bid in reserve for every other open slot; bench
      // picks need no reserve, so a full active roster can bid everything left
      const reserved = openSlots > 0 ? settings.minBid * (openSlots - 1) : 0;
      const maxBid = Math.max(0, remaining - reserved);
      return { teamId, spent, remaining, openSlots, reserved, maxBid };
    };

    const removePick = async (pickId: string): Promise<Player | undefined> => {
      const result = await repository.removePick(pickId);
      if (!result) return undefined;
      await commitValuation(result.sequence);
      if (isDebugMode()) {
        console.log(`[DraftStore] undid pick #${result.pick.pickNumber}`);
      }
      return get().players.find(p => p.id === result.pick.playerId);
    };

    return {
      settings,
      players: [],
      teams: [],
      draftHistory: [],
      sequence: 0,
      valuation: undefined,
      valuesStale: false,

      initializeDraft: (players, teamNames) =>
        exclusive(async () => {
          const ids = new Set<string>();
          for (const player of players) {
            if (ids.has(player.id)) {
              throw new DraftError(`Duplicate player id ${player.id}`);
            }
            ids.add(player.id);
          }
          await repository.replacePool(players, createInitialTeams(settings, teamNames));
          return commitValuation(0);
        }),

      loadDraft: () =>
        exclusive(async () => {
          const [snapshot, stored] = await Promise.all([repository.loadSnapshot(), repository.loadEpoch()]);
          const settingsKey = settingsFingerprint(settings, options.mode ?? settings.valuationMode);
          if (stored && stored.epoch === snapshot.sequence && stored.settingsKey === settingsKey) {
            set({
              players: snapshot.players,
              teams: snapshot.teams,
              draftHistory: snapshot.picks,
              sequence: snapshot.sequence,
              valuation: stored,
              valuesStale: false
            });
            return stored;
          }
          if (stored && isDebugMode()) {
            console.log(`[DraftStore] stored epoch ${stored.epoch} is out of date, recalculating`);
          }
          return commitValuation(snapshot.sequence);
        }),

      draftPlayer: (playerId, teamId, price) =>
        exclusive(async () => {
          const { players, draftHistory, valuation, valuesStale } = get();
          const player = players.find(p => p.id === playerId);
          if (!player) {
            throw new DraftError(`Player ${playerId} not found`);
          }
          if (player.isDrafted) {
            throw new DraftError(`${player.name} has already been drafted`);
          }

          findTeam(teamId);
          if (draftHistory.filter(p => p.teamId === teamId).length >= rosterSize(settings)) {
            throw new DraftError(`Roster for team ${teamId} is full`);
          }
          const budget = teamBudget(teamId);
          if (!Number.isFinite(price) || price < settings.minBid) {
            throw new DraftError(`Price must be at least $${settings.minBid}`);
          }
          if (price > budget.maxBid) {
            throw new DraftError(
              `Team ${teamId} can bid at most $${budget.maxBid} (tried to spend $${price})`
            );
          }

          const pick: DraftPick = {
            id: randomUUID(),
            playerId,
            teamId,
            price,
            pickNumber: draftHistory.reduce((max, p) => Math.max(max, p.pickNumber), 0) + 1,
            timestamp: new Date(),
            frozenValuation: valuesStale ? undefined : valuation?.values[playerId]
          };

          const sequence = await repository.recordPick(pick);
          await commitValuation(sequence);

          if (isDebugMode()) {
            console.log(`[DraftStore] pick #${pick.pickNumber}: ${player.name} to ${teamId} for $${price}`);
          }
          return pick;
        }),

      undoLastPick: () =>
        exclusive(async () => {
          const { draftHistory } = get();
          if (draftHistory.length === 0) return undefined;
          const last = draftHistory.reduce((a, b) => (b.pickNumber > a.pickNumber ? b : a));
          return removePick(last.id);
        }),

      undoPick: pickId => exclusive(() => removePick(pickId)),

      resetDraft: () =>
        exclusive(async () => {
          const sequence = await repository.clearDraft();
          return commitValuation(sequence);
        }),

      refreshValues: () => exclusive(() => commitValuation(get().sequence)),

      getValuation: playerId => {
        const { players, draftHistory, valuation, valuesStale } = get();
        const player = players.find(p => p.id === playerId);

        if (player?.isDrafted) {
          const frozen = draftHistory.find(p => p.playerId === playerId)?.frozenValuation;
          if (frozen) return frozen;
        } else if (valuation && !valuesStale) {
          const current = valuation.values[playerId];
          if (current) return current;
        }

        throw new AppError(`No value available for player ${playerId}`, 'VALUES_NOT_READY', 404);
      },

      getValue: playerId => get().getValuation(playerId).dollarValue,

      getDraftHistory: limit => {
        const recentFirst = [...get().draftHistory].sort((a, b) => b.pickNumber - a.pickNumber);
        return limit ? recentFirst.slice(0, limit) : recentFirst;
      },

      getTeamBudget: teamBudget,

      getRemainingBudget: () =>
        get().teams.reduce((sum, team) => sum + teamBudget(team.id).remaining, 0)
    };
  });
};

export type DraftStore = ReturnType<typeof createDraftStore>;
