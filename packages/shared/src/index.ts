// @herald/shared: barrel export
export type { MessageCategory, AccentTone, CategoryStyle } from './message.types.js';
export type { RuleId, RuleSeverity, LintIssue, LintReport } from './lint.types.js';
export type { HeraldConfig, EnforceMode, LogLevel } from './config.types.js';
