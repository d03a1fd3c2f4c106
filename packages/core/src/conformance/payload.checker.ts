import { ComponentType, MessageFlags } from 'discord.js';
import type { HeraldConfig, LintIssue, RuleId } from '@herald/shared';
import { formatColor, parseHeading, toneForSymbol } from '../styles/category.styles.js';
import { hasFlag } from '../messages/message.payload.js';

export type CheckConfig = Pick<HeraldConfig, 'palette' | 'lint'>;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Builders serialize through toJSON(); raw API objects pass through. */
function serialize(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    return json;
  }
  return value;
}

function children(component: JsonObject): JsonObject[] {
  const list = component['components'];
  if (!Array.isArray(list)) return [];
  return list.map(serialize).filter(isObject);
}

/** Content of the first text display in a container, looking inside a leading section. */
function firstText(container: JsonObject): string | null {
  const first = children(container)[0];
  if (!first) return null;
  if (first['type'] === ComponentType.TextDisplay && typeof first['content'] === 'string') {
    return first['content'];
  }
  if (first['type'] === ComponentType.Section) {
    return firstText(first);
  }
  return null;
}

class IssueCollector {
  readonly issues: LintIssue[] = [];

  constructor(private readonly rules: HeraldConfig['lint']['rules']) {}

  enabled(rule: RuleId): boolean {
    return this.rules[rule] !== 'off';
  }

  add(rule: RuleId, message: string): void {
    const severity = this.rules[rule];
    if (severity === 'off') return;
    this.issues.push({ rule, severity, message });
  }
}

function checkContainerStyle(container: JsonObject, config: CheckConfig, out: IssueCollector): void {
  const content = firstText(container);
  if (content === null) return;

  const heading = parseHeading(content);
  if (!heading) return;

  const line = content.split('\n', 1)[0] ?? content;
  if (heading.level === 0) {
    out.add('category-style', `Heading "${line}" is missing its markdown heading marker`);
  }

  const tone = toneForSymbol(heading.symbol);
  if (tone === undefined) return;
  const expected = config.palette[tone];
  const accent = container['accent_color'];
  if (accent !== expected) {
    const actual = typeof accent === 'number' ? formatColor(accent) : 'none';
    out.add(
      'category-style',
      `Heading "${line}" expects the ${tone} accent ${formatColor(expected)}, got ${actual}`,
    );
  }
}

/**
 * Checks one outgoing message payload against the Components V2 message
 * convention. Accepts discord.js builders or raw API objects.
 */
export function checkPayload(payload: unknown, config: CheckConfig): LintIssue[] {
  const out = new IssueCollector(config.lint.rules);

  if (typeof payload === 'string') {
    out.add('structured-container', 'Message is plain text; compose it as a container');
    out.add('components-v2-flag', 'Message does not set MessageFlags.IsComponentsV2');
    out.add('suppress-mentions', 'Message does not set allowedMentions: { parse: [] }');
    return out.issues;
  }
  if (!isObject(payload)) {
    out.add('structured-container', 'Message payload is not an object');
    return out.issues;
  }

  if (!hasFlag(payload['flags'], MessageFlags.IsComponentsV2)) {
    out.add('components-v2-flag', 'Message does not set MessageFlags.IsComponentsV2');
  }

  const components = Array.isArray(payload['components'])
    ? payload['components'].map(serialize).filter(isObject)
    : [];
  const containers = components.filter((c) => c['type'] === ComponentType.Container);
  if (containers.length === 0) {
    out.add('structured-container', 'Message has no top-level container component');
  }
  const content = payload['content'];
  if (typeof content === 'string' && content.length > 0) {
    out.add('structured-container', 'Message sets plain content alongside components');
  }

  // Recorded API payloads use the snake_case field
  const mentions = payload['allowedMentions'] ?? payload['allowed_mentions'];
  if (!isObject(mentions)) {
    out.add('suppress-mentions', 'Message does not set allowedMentions: { parse: [] }');
  } else if (!Array.isArray(mentions['parse']) || mentions['parse'].length > 0) {
    out.add('suppress-mentions', 'allowedMentions.parse must be an empty list');
  }

  const embeds = payload['embeds'];
  if (Array.isArray(embeds) && embeds.length > 0) {
    out.add('no-legacy-embeds', 'Message combines embeds with the container format');
  }

  if (payload['ephemeral'] === true) {
    out.add(
      'legacy-ephemeral',
      'Message uses ephemeral: true; set MessageFlags.Ephemeral with IsComponentsV2',
    );
  }

  if (out.enabled('category-style')) {
    for (const container of containers) {
      checkContainerStyle(container, config, out);
    }
  }

  return out.issues;
}

/** Checks a list of recorded payloads; each issue carries its payload index. */
export function checkPayloads(payloads: unknown[], config: CheckConfig): LintIssue[] {
  return payloads.flatMap((payload, index) =>
    checkPayload(payload, config).map((issue) => ({ ...issue, index })),
  );
}
