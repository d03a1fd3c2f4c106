export type RuleId =
  | 'components-v2-flag'
  | 'structured-container'
  | 'suppress-mentions'
  | 'no-legacy-embeds'
  | 'legacy-ephemeral'
  | 'category-style';

export type RuleSeverity = 'error' | 'warn' | 'off';

export interface LintIssue {
  rule: RuleId;
  severity: Exclude<RuleSeverity, 'off'>;
  message: string;
  /** Project-relative path, set by the source scanner */
  file?: string;
  line?: number;
  column?: number;
  /** Position in a recorded payload list, set by the payload checker */
  index?: number;
}

export interface LintReport {
  files: number;
  issues: LintIssue[];
  errorCount: number;
  warningCount: number;
}
