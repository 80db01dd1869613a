export {
  ROLE_DESCRIPTIONS,
  ROLE_INSTRUCTIONS,
  ANALYST_FOCUSES,
  RESEARCH_SIDES,
  RISK_STANCES,
} from './desk-roles.js';
export type { DeskRole, AnalystFocus, ResearchSide, RiskStance } from './desk-roles.js';
export { loadDeskSettings } from './env.js';
export type { DeskSettings, DeskEnvKey } from './env.js';
