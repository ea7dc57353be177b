export type PlayerType = 'hitter' | 'pitcher';

export type HitterPosition = 'C' | '1B' | '2B' | '3B' | 'SS' | 'OF';
export type PitcherPosition = 'SP' | 'RP';
export type BasePosition = HitterPosition | PitcherPosition;

export type CompositeSlot = 'CI' | 'MI';
export type UniversalSlot = 'UTIL' | 'P';
export type RosterSlot = BasePosition | CompositeSlot | UniversalSlot | 'BN';

/**
 * Per-team roster requirements, keyed by slot label.
 * Missing labels are treated as zero slots.
 */
export type RosterDemand = Partial<Record<RosterSlot, number>>;

export type CategoryKind = 'counting' | 'rate' | 'ratio';

export interface CategoryConfig {
  key: string;            // stat key on the projection, e.g. 'hr', 'avg', 'era'
  label: string;          // display label, e.g. 'HR'
  playerType: PlayerType;
  kind: CategoryKind;     // rate = higher is better, ratio = lower is better
}

/**
 * Projected statistics for one player. Rate and ratio categories hold the
 * rate itself (avg 0.285, era 3.40); playingTime is at-bats for hitters and
 * innings pitched for pitchers.
 */
export interface StatLine {
  readonly stats: Readonly<Record<string, number>>;
  readonly playingTime: number;
}

export interface Player {
  id: string;
  name: string;
  team: string;
  positions: string[];   // eligibility tags as imported, e.g. ['SS', '2B']
  playerType: PlayerType;
  projection: StatLine;
  isDrafted: boolean;
}

export interface PlayerValuation {
  playerId: string;
  sgp: number;
  sgpBreakdown: Record<string, number>;
  dollarValue: number;
  baselineKey: string;   // which replacement baseline the player was scored against
}

export interface Team {
  id: string;
  name: string;
  budget: number;
  isUserTeam: boolean;
}

export interface DraftPick {
  id: string;
  playerId: string;
  teamId: string;
  price: number;
  pickNumber: number;
  timestamp: Date;
  frozenValuation?: PlayerValuation; // value at the moment the player left the pool
}

export interface LeagueBudget {
  total: number;
  hitter: number;
  pitcher: number;
}

export type ValuationMode = 'global' | 'positional';

/**
 * Committed draft state a recalculation reads. `sequence` is the number of the
 * latest committed pick/undo transaction.
 */
export interface PoolSnapshot {
  players: Player[];
  picks: DraftPick[];
  teams: Team[];
  sequence: number;
}

export interface SlotState {
  slot: RosterSlot;
  required: number;
  filled: number;
  remaining: number;
  playerIds: string[];
}

export interface ValuationEpoch {
  epoch: number;
  mode: ValuationMode;
  settingsKey: string;    // league settings the epoch was computed under
  computedAt: Date;
  values: Record<string, PlayerValuation>;
  baselines: Partial<Record<string, StatLine>>;
  remainingDemand: RosterDemand;
  budgets: { hitter: number; pitcher: number };
}
