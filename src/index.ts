export * from './types';
export * from './services/valuation/leagueSettings';
export * from './services/valuation/positionEligibility';
export * from './services/valuation/sgpEngine';
export * from './services/valuation/replacementLevelCalculator';
export * from './services/valuation/dollarConverter';
export * from './services/valuation/recalculationCoordinator';
export * from './services/database';
export * from './store/draftStore';
export * from './config/leagueConfig';
export * from './config/featureFlags';
export * from './utils/errorHandler';
