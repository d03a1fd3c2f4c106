import type { HeraldConfig } from '@herald/shared';

export const DEFAULT_CONFIG: HeraldConfig = {
  palette: {
    error: 0xed4245,
    success: 0x57f287,
    warning: 0xfee75c,
    primary: 0x5865f2,
  },
  heading: {
    level: 3,
  },
  delivery: {
    enforce: 'warn',
  },
  lint: {
    extensions: ['.ts', '.tsx', '.js', '.mjs', '.cjs'],
    ignoreDirs: ['node_modules', '.git', 'dist'],
    methods: ['reply', 'followUp', 'editReply', 'send', 'edit'],
    rules: {
      'components-v2-flag': 'error',
      'structured-container': 'error',
      'suppress-mentions': 'error',
      'no-legacy-embeds': 'error',
      'legacy-ephemeral': 'error',
      'category-style': 'warn',
    },
  },
  logs: {
    level: 'info',
  },
};
