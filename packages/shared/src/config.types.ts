import type { AccentTone } from './message.types.js';
import type { RuleId, RuleSeverity } from './lint.types.js';

export type EnforceMode = 'throw' | 'warn' | 'off';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface HeraldConfig {
  palette: Record<AccentTone, number>;
  heading: {
    level: number;
  };
  delivery: {
    enforce: EnforceMode;
  };
  lint: {
    extensions: string[];
    ignoreDirs: string[];
    methods: string[];
    rules: Record<RuleId, RuleSeverity>;
  };
  logs: {
    level: LogLevel;
  };
}
