import type { RuleId, RuleSeverity } from '@herald/shared';

export const RULE_IDS: readonly RuleId[] = [
  'components-v2-flag',
  'structured-container',
  'suppress-mentions',
  'no-legacy-embeds',
  'legacy-ephemeral',
  'category-style',
];

export const RULE_SEVERITIES: readonly RuleSeverity[] = ['error', 'warn', 'off'];

export const RULE_DESCRIPTIONS: Record<RuleId, string> = {
  'components-v2-flag': 'Outgoing messages must set MessageFlags.IsComponentsV2',
  'structured-container': 'Outgoing messages must be a container of display blocks, not plain content',
  'suppress-mentions': 'Outgoing messages must set allowedMentions: { parse: [] }',
  'no-legacy-embeds': 'Components V2 messages must not carry embeds',
  'legacy-ephemeral': 'Use MessageFlags.Ephemeral together with IsComponentsV2 instead of ephemeral: true',
  'category-style': 'Category headings must use the accent color of their tone',
};

export function isRuleId(value: unknown): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}

export function isRuleSeverity(value: unknown): value is RuleSeverity {
  return RULE_SEVERITIES.some((severity) => severity === value);
}
