/**
 * Replacement Level Calculator
 * Derives the replacement-level stat line per player type or per position
 * from the remaining pool and the remaining roster demand
 */

import {
  BasePosition,
  CategoryConfig,
  Player,
  PlayerType,
  RosterDemand,
  StatLine,
  ValuationMode
} from '../../types';
import {
  HITTER_POSITIONS,
  PITCHER_POSITIONS,
  distributeSlotDemand,
  slotsForType
} from './leagueSettings';
import { resolve } from './positionEligibility';
import { Dispersion, SgpEngine, SgpScore, categoryTotal } from './sgpEngine';

export type PositionKey = PlayerType | BasePosition;
export type Baselines = Partial<Record<PositionKey, StatLine>>;

export interface BaselineChoice {
  key: PositionKey;
  score: SgpScore;
}

const PLAYER_TYPES: PlayerType[] = ['hitter', 'pitcher'];

export class ReplacementLevelCalculator {
  private engine: SgpEngine;

  constructor(engine: SgpEngine) {
    this.engine = engine;
  }

  /**
   * Replacement baselines for the pool. Global baselines are always present
   * (one per player type that has players); positional mode adds one per
   * base position that still has open slots.
   */
  baseline(
    pool: Player[],
    demand: RosterDemand,
    mode: ValuationMode,
    dispersion: Dispersion = this.engine.computeDispersion(pool)
  ): Baselines {
    const baselines: Baselines = {};
    const prelim = this.preliminaryValues(pool, dispersion);

    for (const playerType of PLAYER_TYPES) {
      const ranked = this.rank(pool.filter(p => p.playerType === playerType), prelim);
      const line = lineAtRank(ranked, slotsForType(demand, playerType));
      if (line) baselines[playerType] = line;
    }

    if (mode === 'positional') {
      const positionDemand = distributeSlotDemand(demand);
      for (const position of [...HITTER_POSITIONS, ...PITCHER_POSITIONS]) {
        const needed = positionDemand[position];
        if (needed <= 0) continue;
        const eligible = pool.filter(p => resolve(p).has(position));
        const line = lineAtRank(this.rank(eligible, prelim), needed);
        if (line) baselines[position] = line;
      }
    }

    return baselines;
  }

  /**
   * First pass: score every player against the pool-average line of their
   * type. Used only to order players for bucketing; the result is never fed
   * back into the ranking.
   */
  preliminaryValues(pool: Player[], dispersion: Dispersion): Map<string, number> {
    const values = new Map<string, number>();

    for (const playerType of PLAYER_TYPES) {
      const players = pool.filter(p => p.playerType === playerType);
      if (players.length === 0) continue;
      const average = averageLine(players, this.engine.categoriesFor(playerType));
      for (const player of players) {
        values.set(player.id, this.engine.score(player, average, dispersion).total);
      }
    }

    return values;
  }

  /**
   * Pick the baseline that gives the player the highest SGP among the
   * positions they are eligible for. Players with no eligible position that
   * has a baseline fall back to their type's global baseline.
   */
  selectBaseline(player: Player, baselines: Baselines, dispersion: Dispersion): BaselineChoice | undefined {
    const order = player.playerType === 'hitter' ? HITTER_POSITIONS : PITCHER_POSITIONS;
    const eligible = resolve(player);
    let best: BaselineChoice | undefined;

    for (const position of order) {
      const line = baselines[position];
      if (!line || !eligible.has(position)) continue;
      const score = this.engine.score(player, line, dispersion);
      if (!best || score.total > best.score.total) {
        best = { key: position, score };
      }
    }

    if (best) return best;

    const fallback = baselines[player.playerType];
    return fallback
      ? { key: player.playerType, score: this.engine.score(player, fallback, dispersion) }
      : undefined;
  }

  private rank(players: Player[], prelim: Map<string, number>): Player[] {
    // Unscored players sort last
    const prelimOf = (p: Player): number => {
      const value = prelim.get(p.id);
      return value !== undefined && Number.isFinite(value) ? value : -Infinity;
    };
    return [...players].sort((a, b) => {
      const va = prelimOf(a);
      const vb = prelimOf(b);
      if (va !== vb) return vb > va ? 1 : -1;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
  }
}

/**
 * Line of the player at 1-based rank n; the last player when fewer than n
 * are available, the first when n is not positive
 */
function lineAtRank(ranked: Player[], n: number): StatLine | undefined {
  if (ranked.length === 0) return undefined;
  const index = Math.min(Math.max(n, 1), ranked.length) - 1;
  return ranked[index].projection;
}

/**
 * Average stat line of a group. Counting categories use the mean; rate and
 * ratio categories use total numerator over total playing time.
 */
export function averageLine(players: Player[], categories: CategoryConfig[]): StatLine {
  const withTime = players.filter(p => p.projection.playingTime > 0);
  const totalTime = withTime.reduce((sum, p) => sum + p.projection.playingTime, 0);
  const stats: Record<string, number> = {};

  for (const category of categories) {
    if (category.kind === 'counting') {
      const total = players.reduce((sum, p) => sum + categoryTotal(p.projection, category), 0);
      stats[category.key] = players.length > 0 ? total / players.length : 0;
    } else {
      const total = withTime.reduce((sum, p) => sum + categoryTotal(p.projection, category), 0);
      stats[category.key] = totalTime > 0 ? total / totalTime : 0;
    }
  }

  return {
    stats,
    playingTime: withTime.length > 0 ? totalTime / withTime.length : 0
  };
}
