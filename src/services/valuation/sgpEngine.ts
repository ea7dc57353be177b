/**
 * SGP Engine
 * Converts a projected stat line into standings gain points relative to a
 * replacement baseline, normalized by category dispersion across the pool
 */

import { CategoryConfig, Player, PlayerType, StatLine } from '../../types';

export type Dispersion = Record<string, number>;

export interface SgpScore {
  total: number;
  breakdown: Record<string, number>;
}

export function statValue(line: StatLine, key: string): number {
  const value = line.stats[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * The quantity a category accumulates: the stat itself for counting
 * categories, rate x playing time (hits, earned runs) otherwise
 */
export function categoryTotal(line: StatLine, category: CategoryConfig): number {
  const value = statValue(line, category.key);
  return category.kind === 'counting' ? value : value * line.playingTime;
}

export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export class SgpEngine {
  private categories: CategoryConfig[];

  constructor(categories: CategoryConfig[]) {
    this.categories = categories;
  }

  categoriesFor(playerType: PlayerType): CategoryConfig[] {
    return this.categories.filter(c => c.playerType === playerType);
  }

  /**
   * Standard deviation of each category across every player of the
   * category's type. Players without playing time do not contribute.
   */
  computeDispersion(pool: Player[]): Dispersion {
    const dispersion: Dispersion = {};

    for (const category of this.categories) {
      const values = pool
        .filter(p => p.playerType === category.playerType && p.projection.playingTime > 0)
        .map(p => categoryTotal(p.projection, category));
      dispersion[category.key] = sampleStdDev(values);
    }

    return dispersion;
  }

  score(player: Player, baseline: StatLine, dispersion: Dispersion): SgpScore {
    return this.scoreLine(player.projection, player.playerType, baseline, dispersion);
  }

  scoreLine(
    line: StatLine,
    playerType: PlayerType,
    baseline: StatLine,
    dispersion: Dispersion
  ): SgpScore {
    const breakdown: Record<string, number> = {};
    let total = 0;

    for (const category of this.categoriesFor(playerType)) {
      const sgp = this.categorySgp(line, baseline, category, dispersion[category.key] ?? 0);
      breakdown[category.key] = sgp;
      total += sgp;
    }

    return { total, breakdown };
  }

  private categorySgp(
    line: StatLine,
    baseline: StatLine,
    category: CategoryConfig,
    denominator: number
  ): number {
    // Degenerate pool: the category cannot separate players
    if (!(denominator > 0)) return 0;

    const playerStat = statValue(line, category.key);
    const baselineStat = statValue(baseline, category.key);

    switch (category.kind) {
      case 'counting':
        return (playerStat - baselineStat) / denominator;
      case 'rate': {
        if (!(line.playingTime > 0)) return 0;
        const expected = baselineStat * line.playingTime;
        return (playerStat * line.playingTime - expected) / denominator;
      }
      case 'ratio': {
        if (!(line.playingTime > 0)) return 0;
        const expected = baselineStat * line.playingTime;
        return (expected - playerStat * line.playingTime) / denominator;
      }
    }
  }
}
