import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyEnvOverrides, loadLeagueSettings } from '../leagueConfig';
import { defaultLeagueSettings } from '../../services/valuation/leagueSettings';
import { ConfigurationError } from '../../utils/errorHandler';
import { getFeatureFlags, isDebugMode } from '../featureFlags';

describe('applyEnvOverrides', () => {
  it('should override numeric fields and the valuation mode', () => {
    const merged = applyEnvOverrides(
      { ...defaultLeagueSettings },
      { LEAGUE_TEAMS: '10', LEAGUE_MIN_BID: '2', VALUATION_MODE: ' global ' }
    );

    expect(merged.numTeams).toBe(10);
    expect(merged.minBid).toBe(2);
    expect(merged.valuationMode).toBe('global');
    expect(merged.budgetPerTeam).toBe(260);
  });

  it('should ignore blank values', () => {
    const merged = applyEnvOverrides({ ...defaultLeagueSettings }, { LEAGUE_BUDGET: '  ' });
    expect(merged.budgetPerTeam).toBe(260);
  });

  it('should reject values that are not numbers', () => {
    expect(() => applyEnvOverrides({ ...defaultLeagueSettings }, { LEAGUE_BUDGET: 'abc' })).toThrow(
      'Invalid league settings: LEAGUE_BUDGET: expected a number, got "abc"'
    );
  });
});

describe('loadLeagueSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'league-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should fill omitted fields from the defaults', () => {
    const file = path.join(dir, 'league.json');
    fs.writeFileSync(file, JSON.stringify({ name: 'Office League', numTeams: 10, budgetPerTeam: 300 }));

    const settings = loadLeagueSettings(file, {});

    expect(settings.name).toBe('Office League');
    expect(settings.numTeams).toBe(10);
    expect(settings.budgetPerTeam).toBe(300);
    expect(settings.minBid).toBe(1);
    expect(settings.rosterSpots).toEqual(defaultLeagueSettings.rosterSpots);
  });

  it('should use the defaults when the file does not exist', () => {
    expect(loadLeagueSettings(path.join(dir, 'missing.json'), {})).toEqual(defaultLeagueSettings);
  });

  it('should let the environment win over the file', () => {
    const file = path.join(dir, 'league.json');
    fs.writeFileSync(file, JSON.stringify({ numTeams: 10 }));

    expect(loadLeagueSettings(file, { LEAGUE_TEAMS: '14' }).numTeams).toBe(14);
  });

  it('should reject malformed files', () => {
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ "numTeams": ');
    expect(() => loadLeagueSettings(broken, {})).toThrow(ConfigurationError);

    const list = path.join(dir, 'list.json');
    fs.writeFileSync(list, '[1, 2]');
    expect(() => loadLeagueSettings(list, {})).toThrow(`${list}: expected a JSON object`);
  });

  it('should validate the merged result', () => {
    expect(() => loadLeagueSettings(path.join(dir, 'missing.json'), { LEAGUE_HITTER_FRACTION: '1.5' })).toThrow(
      /hitterBudgetFraction/
    );
  });
});

describe('feature flags', () => {
  const original = process.env.DEBUG_VALUATION;

  afterEach(() => {
    if (original === undefined) delete process.env.DEBUG_VALUATION;
    else process.env.DEBUG_VALUATION = original;
  });

  it('should read the debug flag from the environment', () => {
    process.env.DEBUG_VALUATION = 'true';
    expect(isDebugMode()).toBe(true);

    process.env.DEBUG_VALUATION = '0';
    expect(getFeatureFlags()).toEqual({ debugValuation: false });

    delete process.env.DEBUG_VALUATION;
    expect(isDebugMode()).toBe(false);
  });
});
