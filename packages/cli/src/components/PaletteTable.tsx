import React from 'react';
import { Box, Text } from 'ink';
import type { HeraldConfig } from '@herald/shared';
import { CATEGORY_STYLES, MESSAGE_CATEGORIES, formatColor, formatHeading, resolveAccent } from '@herald/core';
import { THEME } from '../theme.js';
import { Banner } from './Banner.js';

interface PaletteTableProps {
  config: HeraldConfig;
}

export const PaletteTable: React.FC<PaletteTableProps> = ({ config }) => {
  return (
    <Box flexDirection="column">
      <Banner title="palette" detail={`heading level ${config.heading.level}`} />
      <Box flexDirection="column" paddingX={1} marginY={1}>
        {MESSAGE_CATEGORIES.map((category) => {
          const color = formatColor(resolveAccent(category, config.palette));
          return (
            <Box key={category} gap={2}>
              <Box width={20}>
                <Text color={THEME.text}>{category}</Text>
              </Box>
              <Box width={10}>
                <Text color={THEME.dim}>{CATEGORY_STYLES[category].tone}</Text>
              </Box>
              <Box width={9}>
                <Text color={color}>{color}</Text>
              </Box>
              <Text color={THEME.textDim}>
                {formatHeading(category, undefined, config.heading.level)}
              </Text>
            </Box>
          );
        })}
      </Box>
    </Box>
  );
};
