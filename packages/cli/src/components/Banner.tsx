import React from 'react';
import { Box, Text } from 'ink';
import { THEME } from '../theme.js';

interface BannerProps {
  title: string;
  detail?: string;
}

export const Banner: React.FC<BannerProps> = ({ title, detail }) => {
  return (
    <Box borderStyle="single" borderColor={THEME.accent} paddingX={1} justifyContent="space-between">
      <Text bold color={THEME.primary}>
        📣 HERALD · {title}
      </Text>
      {detail ? <Text color={THEME.dim}>{detail}</Text> : null}
    </Box>
  );
};
