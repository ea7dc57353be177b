/**
 * League Settings Configuration
 * Defines league structure, budget split and scoring categories for valuation
 */

import { z } from 'zod';
import {
  BasePosition,
  CategoryConfig,
  LeagueBudget,
  PlayerType,
  RosterDemand,
  RosterSlot,
  ValuationMode
} from '../../types';
import { ConfigurationError } from '../../utils/errorHandler';

export interface LeagueSettings {
  name: string;
  numTeams: number;
  budgetPerTeam: number;
  minBid: number;
  rosterSpots: RosterDemand;
  categories: CategoryConfig[];
  hitterBudgetFraction: number;   // pitchers get the complement
  valuationMode: ValuationMode;
}

export const HITTER_SLOTS: RosterSlot[] = ['C', '1B', '2B', '3B', 'SS', 'CI', 'MI', 'OF', 'UTIL'];
export const PITCHER_SLOTS: RosterSlot[] = ['SP', 'RP', 'P'];
export const ALL_SLOTS: RosterSlot[] = [...HITTER_SLOTS, ...PITCHER_SLOTS, 'BN'];

export const HITTER_POSITIONS: BasePosition[] = ['C', '1B', '2B', '3B', 'SS', 'OF'];
export const PITCHER_POSITIONS: BasePosition[] = ['SP', 'RP'];

// Composite slot demand is split between its two base positions;
// the odd slot goes to the second one.
const COMPOSITE_SPLITS: Array<[RosterSlot, BasePosition, BasePosition]> = [
  ['CI', '1B', '3B'],
  ['MI', '2B', 'SS'],
  ['P', 'SP', 'RP']
];

export const STANDARD_CATEGORIES: CategoryConfig[] = [
  { key: 'r', label: 'R', playerType: 'hitter', kind: 'counting' },
  { key: 'hr', label: 'HR', playerType: 'hitter', kind: 'counting' },
  { key: 'rbi', label: 'RBI', playerType: 'hitter', kind: 'counting' },
  { key: 'sb', label: 'SB', playerType: 'hitter', kind: 'counting' },
  { key: 'avg', label: 'AVG', playerType: 'hitter', kind: 'rate' },
  { key: 'w', label: 'W', playerType: 'pitcher', kind: 'counting' },
  { key: 'sv', label: 'SV', playerType: 'pitcher', kind: 'counting' },
  { key: 'k', label: 'K', playerType: 'pitcher', kind: 'counting' },
  { key: 'era', label: 'ERA', playerType: 'pitcher', kind: 'ratio' },
  { key: 'whip', label: 'WHIP', playerType: 'pitcher', kind: 'ratio' }
];

// Default settings for a standard 12-team 5x5 auction league
export const defaultLeagueSettings: LeagueSettings = {
  name: 'My League',
  numTeams: 12,
  budgetPerTeam: 260,
  minBid: 1,
  rosterSpots: {
    C: 1,
    '1B': 1,
    '2B': 1,
    '3B': 1,
    SS: 1,
    CI: 0,
    MI: 0,
    OF: 3,
    UTIL: 1,
    SP: 2,
    RP: 2,
    P: 2,
    BN: 3
  },
  categories: STANDARD_CATEGORIES,
  hitterBudgetFraction: 0.68,
  valuationMode: 'positional'
};

// Preset configurations
export const leaguePresets = {
  standard: defaultLeagueSettings,

  twoCatcher: {
    ...defaultLeagueSettings,
    rosterSpots: {
      ...defaultLeagueSettings.rosterSpots,
      C: 2
    }
  },

  cornerMiddle: {
    ...defaultLeagueSettings,
    rosterSpots: {
      ...defaultLeagueSettings.rosterSpots,
      CI: 1,
      MI: 1,
      OF: 5
    }
  }
} satisfies Record<string, LeagueSettings>;

const slotCount = z.number().int().nonnegative();

const RosterSpotsSchema = z
  .object({
    C: slotCount,
    '1B': slotCount,
    '2B': slotCount,
    '3B': slotCount,
    SS: slotCount,
    CI: slotCount,
    MI: slotCount,
    OF: slotCount,
    UTIL: slotCount,
    SP: slotCount,
    RP: slotCount,
    P: slotCount,
    BN: slotCount
  })
  .partial()
  .strict();

const CategorySchema = z.object({
  key: z.string().trim().min(1),
  label: z.string().trim().min(1),
  playerType: z.enum(['hitter', 'pitcher']),
  kind: z.enum(['counting', 'rate', 'ratio'])
});

export const LeagueSettingsSchema = z
  .object({
    name: z.string().default('My League'),
    numTeams: z.number().int().min(1),
    budgetPerTeam: z.number().positive(),
    minBid: z.number().nonnegative(),
    rosterSpots: RosterSpotsSchema,
    categories: z.array(CategorySchema),
    hitterBudgetFraction: z.number().min(0).max(1),
    valuationMode: z.enum(['global', 'positional']).default('positional')
  })
  .superRefine((settings, ctx) => {
    for (const playerType of ['hitter', 'pitcher'] as const) {
      const keys = settings.categories.filter(c => c.playerType === playerType).map(c => c.key);
      if (keys.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories'],
          message: `no ${playerType} categories configured`
        });
      }
      const duplicates = keys.filter((key, i) => keys.indexOf(key) !== i);
      if (duplicates.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories'],
          message: `duplicate ${playerType} categories: ${[...new Set(duplicates)].join(', ')}`
        });
      }
    }

    const rosterSize = ALL_SLOTS.reduce((sum, slot) => sum + (settings.rosterSpots[slot] ?? 0), 0);
    if (rosterSize === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rosterSpots'],
        message: 'roster has no slots'
      });
    }
    if (settings.minBid * rosterSize > settings.budgetPerTeam) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minBid'],
        message: `minimum bid of ${settings.minBid} across ${rosterSize} roster spots exceeds the team budget of ${settings.budgetPerTeam}`
      });
    }
  });

/**
 * Parse and validate league settings. Throws ConfigurationError listing every
 * problem found; nothing is coerced.
 */
export function validateLeagueSettings(input: unknown): LeagueSettings {
  const result = LeagueSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(issues);
  }
  return result.data;
}

export function totalLeagueBudget(settings: LeagueSettings): number {
  return settings.numTeams * settings.budgetPerTeam;
}

export function getLeagueBudget(settings: LeagueSettings): LeagueBudget {
  const total = totalLeagueBudget(settings);
  return {
    total,
    hitter: total * settings.hitterBudgetFraction,
    pitcher: total * (1 - settings.hitterBudgetFraction)
  };
}

export function categoriesFor(settings: LeagueSettings, playerType: PlayerType): CategoryConfig[] {
  return settings.categories.filter(c => c.playerType === playerType);
}

function sumSlots(spots: RosterDemand, slots: RosterSlot[]): number {
  return slots.reduce((sum, slot) => sum + (spots[slot] ?? 0), 0);
}

/** Hitter roster spots per team, bench excluded */
export function hitterRosterSpots(settings: LeagueSettings): number {
  return sumSlots(settings.rosterSpots, HITTER_SLOTS);
}

/** Pitcher roster spots per team, bench excluded */
export function pitcherRosterSpots(settings: LeagueSettings): number {
  return sumSlots(settings.rosterSpots, PITCHER_SLOTS);
}

/** Open slots of a player type in a (league-wide or per-team) demand map */
export function slotsForType(demand: RosterDemand, playerType: PlayerType): number {
  return sumSlots(demand, playerType === 'hitter' ? HITTER_SLOTS : PITCHER_SLOTS);
}

/** Per-team roster demand scaled to the whole league */
export function leagueWideDemand(settings: LeagueSettings): RosterDemand {
  const demand: RosterDemand = {};
  for (const slot of ALL_SLOTS) {
    demand[slot] = (settings.rosterSpots[slot] ?? 0) * settings.numTeams;
  }
  return demand;
}

/**
 * Number of players needed at each base position, given league-wide slot
 * counts. CI, MI and P demand is split between their constituent positions;
 * UTIL and BN are not attributed to any position.
 */
export function distributeSlotDemand(slots: RosterDemand): Record<BasePosition, number> {
  const demand: Record<BasePosition, number> = {
    C: slots.C ?? 0,
    '1B': slots['1B'] ?? 0,
    '2B': slots['2B'] ?? 0,
    '3B': slots['3B'] ?? 0,
    SS: slots.SS ?? 0,
    OF: slots.OF ?? 0,
    SP: slots.SP ?? 0,
    RP: slots.RP ?? 0
  };

  for (const [slot, first, second] of COMPOSITE_SPLITS) {
    const count = slots[slot] ?? 0;
    if (count <= 0) continue;
    const half = Math.floor(count / 2);
    demand[first] += half;
    demand[second] += count - half;
  }

  return demand;
}

/**
 * How many players at each position will be drafted league-wide
 */
export function getPositionalDemand(settings: LeagueSettings): Record<BasePosition, number> {
  return distributeSlotDemand(leagueWideDemand(settings));
}

/**
 * Get a descriptive name for the league format
 */
export function getLeagueFormatName(settings: LeagueSettings): string {
  const parts: string[] = [];

  parts.push(`${settings.numTeams}-team`);

  const hitting = categoriesFor(settings, 'hitter').length;
  const pitching = categoriesFor(settings, 'pitcher').length;
  parts.push(hitting === pitching ? `${hitting}x${pitching}` : `${hitting}+${pitching}`);

  if ((settings.rosterSpots.C ?? 0) >= 2) {
    parts.push('Two-Catcher');
  }

  parts.push(`$${settings.budgetPerTeam}`);
  parts.push('Auction');

  return parts.join(' ');
}
