/**
 * Recalculation Coordinator
 * Re-derives every undrafted player's SGP and dollar value from committed
 * draft state. Always a full pass: baselines and dispersion are pool-wide.
 */

import {
  DraftPick,
  Player,
  PlayerType,
  PlayerValuation,
  PoolSnapshot,
  RosterDemand,
  ValuationEpoch,
  ValuationMode
} from '../../types';
import { AppError, TransactionConflictError } from '../../utils/errorHandler';
import { isDebugMode } from '../../config/featureFlags';
import {
  LeagueSettings,
  getLeagueBudget,
  leagueWideDemand,
  validateLeagueSettings
} from './leagueSettings';
import { assignRoster } from './positionEligibility';
import { ReplacementLevelCalculator } from './replacementLevelCalculator';
import { SgpEngine } from './sgpEngine';
import { toDollars } from './dollarConverter';

export interface RecalculateOptions {
  mode?: ValuationMode;         // defaults to settings.valuationMode
  expectedSequence?: number;    // sequence the caller believes is current
}

const PLAYER_TYPES: PlayerType[] = ['hitter', 'pitcher'];

export function recalculate(
  snapshot: PoolSnapshot,
  settings: LeagueSettings,
  options: RecalculateOptions = {}
): ValuationEpoch {
  const league = validateLeagueSettings(settings);
  assertConsistent(snapshot, options.expectedSequence);

  const mode = options.mode ?? league.valuationMode;
  const undrafted = snapshot.players.filter(p => !p.isDrafted);
  const remainingDemand = computeRemainingDemand(snapshot, league);
  const budgets = remainingBudgets(snapshot, league);

  const engine = new SgpEngine(league.categories);
  const calculator = new ReplacementLevelCalculator(engine);
  const dispersion = engine.computeDispersion(undrafted);
  const baselines = calculator.baseline(undrafted, remainingDemand, mode, dispersion);

  const values: Record<string, PlayerValuation> = {};

  for (const playerType of PLAYER_TYPES) {
    const pool = undrafted.filter(p => p.playerType === playerType);
    if (pool.length === 0) {
      if (budgets[playerType] > 0) {
        console.warn(`[RecalculationCoordinator] no undrafted ${playerType}s left with $${budgets[playerType]} unspent`);
      }
      continue;
    }

    const scored = pool.map(player => {
      const choice = calculator.selectBaseline(player, baselines, dispersion);
      return {
        player,
        key: choice?.key ?? playerType,
        sgp: choice?.score.total ?? 0,
        breakdown: choice?.score.breakdown ?? {}
      };
    });

    const conversion = toDollars(
      scored.map(s => ({ playerId: s.player.id, sgp: s.sgp })),
      budgets[playerType],
      league.minBid
    );

    for (const s of scored) {
      values[s.player.id] = {
        playerId: s.player.id,
        sgp: s.sgp,
        sgpBreakdown: s.breakdown,
        dollarValue: conversion.values[s.player.id],
        baselineKey: s.key
      };
    }

    if (isDebugMode()) {
      console.log(
        `[RecalculationCoordinator] ${playerType}s: ${pool.length} valued, ` +
        `$${budgets[playerType].toFixed(0)} remaining, $${conversion.dollarsPerSgp.toFixed(2)}/SGP`
      );
    }
  }

  if (isDebugMode()) {
    console.log(`[RecalculationCoordinator] epoch ${snapshot.sequence} (${mode}) complete`);
  }

  return {
    epoch: snapshot.sequence,
    mode,
    settingsKey: settingsFingerprint(league, mode),
    computedAt: new Date(),
    values,
    baselines,
    remainingDemand,
    budgets
  };
}

/**
 * Identifies the settings and mode an epoch was computed under; a stored
 * epoch is only reusable when this matches.
 */
export function settingsFingerprint(settings: LeagueSettings, mode: ValuationMode): string {
  return JSON.stringify({ ...settings, valuationMode: mode });
}

/**
 * Dollar value of an undrafted player in the given epoch
 */
export function valueOf(epoch: ValuationEpoch | undefined, playerId: string): number {
  const valuation = epoch?.values[playerId];
  if (!valuation) {
    throw new AppError(`No value computed for player ${playerId}`, 'VALUES_NOT_READY', 404);
  }
  return valuation.dollarValue;
}

/**
 * The drafted flags must describe exactly the players in the pick log, and
 * the snapshot must be the one the caller expects.
 */
export function assertConsistent(snapshot: PoolSnapshot, expectedSequence?: number): void {
  if (expectedSequence !== undefined && expectedSequence !== snapshot.sequence) {
    throw new TransactionConflictError(
      `Pool is at transaction ${snapshot.sequence}, expected ${expectedSequence}`,
      snapshot.sequence,
      expectedSequence
    );
  }

  const picked = new Set<string>();
  for (const pick of snapshot.picks) {
    if (picked.has(pick.playerId)) {
      throw new TransactionConflictError(
        `Player ${pick.playerId} appears in more than one pick`,
        snapshot.sequence,
        expectedSequence
      );
    }
    picked.add(pick.playerId);
  }

  const known = new Set(snapshot.players.map(p => p.id));
  for (const playerId of picked) {
    if (!known.has(playerId)) {
      throw new TransactionConflictError(
        `Pick references unknown player ${playerId}`,
        snapshot.sequence,
        expectedSequence
      );
    }
  }

  for (const player of snapshot.players) {
    if (player.isDrafted !== picked.has(player.id)) {
      throw new TransactionConflictError(
        `Drafted flag for ${player.name} does not match the pick log`,
        snapshot.sequence,
        expectedSequence
      );
    }
  }
}

function picksByTeam(picks: DraftPick[]): Map<string, DraftPick[]> {
  const byTeam = new Map<string, DraftPick[]>();
  for (const pick of [...picks].sort((a, b) => a.pickNumber - b.pickNumber)) {
    const list = byTeam.get(pick.teamId) ?? [];
    list.push(pick);
    byTeam.set(pick.teamId, list);
  }
  return byTeam;
}

/**
 * League-wide open slots: total demand minus the slots each team has filled
 */
export function computeRemainingDemand(snapshot: PoolSnapshot, settings: LeagueSettings): RosterDemand {
  const remaining = leagueWideDemand(settings);
  const playerById = new Map(snapshot.players.map(p => [p.id, p] as const));

  for (const teamPicks of picksByTeam(snapshot.picks).values()) {
    const roster = teamPicks
      .map(pick => playerById.get(pick.playerId))
      .filter((p): p is Player => p !== undefined);

    for (const state of assignRoster(roster, settings.rosterSpots)) {
      remaining[state.slot] = Math.max(0, (remaining[state.slot] ?? 0) - state.filled);
    }
  }

  return remaining;
}

/**
 * Sub-budgets less what has already been spent on each player type
 */
export function remainingBudgets(
  snapshot: PoolSnapshot,
  settings: LeagueSettings
): Record<PlayerType, number> {
  const budget = getLeagueBudget(settings);
  const typeById = new Map(snapshot.players.map(p => [p.id, p.playerType] as const));
  const spent: Record<PlayerType, number> = { hitter: 0, pitcher: 0 };

  for (const pick of snapshot.picks) {
    const playerType = typeById.get(pick.playerId);
    if (playerType) spent[playerType] += pick.price;
  }

  return {
    hitter: Math.max(0, budget.hitter - spent.hitter),
    pitcher: Math.max(0, budget.pitcher - spent.pitcher)
  };
}
