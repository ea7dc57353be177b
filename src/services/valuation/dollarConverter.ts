/**
 * Dollar Converter
 * Maps SGP to auction dollars so that positive SGP across a sub-pool
 * accounts for exactly its sub-budget
 */

import { PlayerValuation } from '../../types';

export interface ScoredPlayer {
  playerId: string;
  sgp: number;
}

export interface DollarConversion {
  values: Record<string, number>;
  dollarsPerSgp: number;
  totalPositiveSgp: number;
}

export function toDollars(scored: ScoredPlayer[], subBudget: number, minBid: number): DollarConversion {
  const totalPositiveSgp = scored.reduce((sum, p) => sum + Math.max(0, p.sgp), 0);
  const values: Record<string, number> = {};

  if (totalPositiveSgp <= 0) {
    for (const p of scored) values[p.playerId] = minBid;
    return { values, dollarsPerSgp: 0, totalPositiveSgp: 0 };
  }

  const dollarsPerSgp = Math.max(0, subBudget) / totalPositiveSgp;
  for (const p of scored) {
    values[p.playerId] = Math.max(minBid, p.sgp * dollarsPerSgp);
  }

  return { values, dollarsPerSgp, totalPositiveSgp };
}

/**
 * Split a player's surplus (value minus price paid) across categories in
 * proportion to each category's SGP contribution
 */
export function categorySurplus(valuation: PlayerValuation, pricePaid: number): Record<string, number> {
  const categories = Object.keys(valuation.sgpBreakdown);
  if (categories.length === 0) return {};

  const totalSurplus = valuation.dollarValue - pricePaid;
  const surplus: Record<string, number> = {};

  if (valuation.sgp === 0) {
    for (const cat of categories) surplus[cat] = totalSurplus / categories.length;
    return surplus;
  }

  for (const cat of categories) {
    surplus[cat] = (valuation.sgpBreakdown[cat] / valuation.sgp) * totalSurplus;
  }
  return surplus;
}
