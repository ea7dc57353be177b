/**
 * Position Eligibility
 * Resolves which roster slots a player can fill from their position tags
 */

import { BasePosition, Player, RosterDemand, RosterSlot, SlotState } from '../../types';
import { HITTER_POSITIONS, PITCHER_POSITIONS } from './leagueSettings';

export const COMPOSITE_SLOTS: Record<'CI' | 'MI', BasePosition[]> = {
  CI: ['1B', '3B'],  // Corner infield
  MI: ['2B', 'SS']   // Middle infield
};

// Outfield tags from some projection sources
const TAG_ALIASES: Record<string, string> = {
  LF: 'OF',
  CF: 'OF',
  RF: 'OF'
};

/**
 * Assignment order, most restrictive first: base positions, then composite,
 * then universal, bench last.
 */
export const SLOT_PRIORITY: RosterSlot[] = [
  'C', '1B', '2B', '3B', 'SS', 'OF', 'CI', 'MI', 'UTIL',
  'SP', 'RP', 'P',
  'BN'
];

export function normalizeTag(tag: string): string {
  const upper = tag.trim().toUpperCase();
  return TAG_ALIASES[upper] ?? upper;
}

/**
 * Base positions a player is eligible for. Unrecognised tags, and tags that
 * belong to the other player type, are ignored.
 */
export function resolve(player: Player): Set<BasePosition> {
  const allowed = player.playerType === 'hitter' ? HITTER_POSITIONS : PITCHER_POSITIONS;
  const resolved = new Set<BasePosition>();

  for (const tag of player.positions) {
    const normalized = normalizeTag(tag);
    const match = allowed.find(pos => pos === normalized);
    if (match) resolved.add(match);
  }

  return resolved;
}

export function fills(player: Player, slot: RosterSlot): boolean {
  switch (slot) {
    case 'BN':
      return true;
    case 'UTIL':
      return player.playerType === 'hitter';
    case 'P':
      return player.playerType === 'pitcher';
    case 'CI':
    case 'MI': {
      const eligible = resolve(player);
      return COMPOSITE_SLOTS[slot].some(pos => eligible.has(pos));
    }
    default:
      return resolve(player).has(slot);
  }
}

/**
 * Greedy slot assignment for one team's roster. Slots are filled in
 * SLOT_PRIORITY order; each slot takes the eligible player with the fewest
 * alternatives so flexible players stay available for later slots.
 * Players are expected in pick order, which breaks ties.
 */
export function assignRoster(players: Player[], rosterSpots: RosterDemand): SlotState[] {
  const activeSlots = SLOT_PRIORITY.filter(slot => (rosterSpots[slot] ?? 0) > 0);
  const flexibility = new Map(
    players.map(p => [p.id, activeSlots.filter(slot => fills(p, slot)).length] as const)
  );
  const assigned = new Set<string>();
  const states: SlotState[] = [];

  for (const slot of activeSlots) {
    const required = rosterSpots[slot] ?? 0;
    const playerIds: string[] = [];

    while (playerIds.length < required) {
      let choice: Player | undefined;
      for (const player of players) {
        if (assigned.has(player.id) || !fills(player, slot)) continue;
        if (!choice || (flexibility.get(player.id) ?? 0) < (flexibility.get(choice.id) ?? 0)) {
          choice = player;
        }
      }
      if (!choice) break;
      assigned.add(choice.id);
      playerIds.push(choice.id);
    }

    states.push({
      slot,
      required,
      filled: playerIds.length,
      remaining: required - playerIds.length,
      playerIds
    });
  }

  return states;
}
