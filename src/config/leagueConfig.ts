/**
 * League configuration loader
 * Reads a league settings JSON file and applies environment overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from 'dotenv';
import {
  LeagueSettings,
  defaultLeagueSettings,
  validateLeagueSettings
} from '../services/valuation/leagueSettings';
import { ConfigurationError } from '../utils/errorHandler';

export const DEFAULT_LEAGUE_FILE = 'league.json';

type Env = Record<string, string | undefined>;

function numberOverride(env: Env, name: string, issues: string[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    issues.push(`${name}: expected a number, got "${raw}"`);
    return undefined;
  }
  return value;
}

/**
 * Apply LEAGUE_* / VALUATION_MODE environment overrides on top of a raw
 * settings object. The result still has to be validated.
 */
export function applyEnvOverrides(base: Record<string, unknown>, env: Env): Record<string, unknown> {
  const issues: string[] = [];
  const merged: Record<string, unknown> = { ...base };

  const numTeams = numberOverride(env, 'LEAGUE_TEAMS', issues);
  const budgetPerTeam = numberOverride(env, 'LEAGUE_BUDGET', issues);
  const minBid = numberOverride(env, 'LEAGUE_MIN_BID', issues);
  const hitterBudgetFraction = numberOverride(env, 'LEAGUE_HITTER_FRACTION', issues);

  if (numTeams !== undefined) merged.numTeams = numTeams;
  if (budgetPerTeam !== undefined) merged.budgetPerTeam = budgetPerTeam;
  if (minBid !== undefined) merged.minBid = minBid;
  if (hitterBudgetFraction !== undefined) merged.hitterBudgetFraction = hitterBudgetFraction;

  const mode = env.VALUATION_MODE?.trim();
  if (mode) merged.valuationMode = mode;

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return merged;
}

function readSettingsFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${filePath}: ${reason}`]);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError([`${filePath}: expected a JSON object`]);
  }
  return { ...defaultLeagueSettings, ...parsed };
}

/**
 * Load league settings from a JSON file (defaults for any omitted field),
 * apply environment overrides, and validate. When no env is passed,
 * process.env is used after loading .env. Without a file the built-in
 * defaults are used.
 */
export function loadLeagueSettings(filePath?: string, env?: Env): LeagueSettings {
  if (!env) config();
  const source: Env = env ?? process.env;

  const resolved = filePath ?? path.resolve(process.cwd(), DEFAULT_LEAGUE_FILE);
  const base: Record<string, unknown> = fs.existsSync(resolved)
    ? readSettingsFile(resolved)
    : { ...defaultLeagueSettings };

  return validateLeagueSettings(applyEnvOverrides(base, source));
}
