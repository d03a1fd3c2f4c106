import React from 'react';
import { Box, Text } from 'ink';
import type { LintReport as Report, RuleId } from '@herald/shared';
import { RULE_DESCRIPTIONS, RULE_IDS, issueLocation } from '@herald/core';
import { THEME } from '../theme.js';
import { Banner } from './Banner.js';

interface LintReportProps {
  title: string;
  report: Report;
  /** Noun for what `report.files` counts */
  unit: string;
}

function firedRules(report: Report): RuleId[] {
  return RULE_IDS.filter((id) => report.issues.some((issue) => issue.rule === id));
}

/**
 * Renders lint findings one per line, what each fired rule asks for, and a
 * summary line colored by the worst severity found.
 */
export const LintReport: React.FC<LintReportProps> = ({ title, report, unit }) => {
  const summaryColor =
    report.errorCount > 0 ? THEME.error : report.warningCount > 0 ? THEME.warning : THEME.success;
  const fired = firedRules(report);

  return (
    <Box flexDirection="column">
      <Banner title={title} detail={`${report.files} ${unit}`} />
      <Box flexDirection="column" paddingX={1} marginY={1}>
        {report.issues.map((issue, i) => (
          <Box key={i} gap={1}>
            <Text color={THEME.textDim}>{issueLocation(issue)}</Text>
            <Text color={issue.severity === 'error' ? THEME.error : THEME.warning}>
              {issue.severity}
            </Text>
            <Text color={THEME.dim}>{issue.rule}</Text>
            <Text color={THEME.text}>{issue.message}</Text>
          </Box>
        ))}
        {fired.length > 0 ? (
          <Box flexDirection="column" marginY={1}>
            {fired.map((id) => (
              <Text key={id} color={THEME.dim}>
                {id}: {RULE_DESCRIPTIONS[id]}
              </Text>
            ))}
          </Box>
        ) : null}
        <Text color={summaryColor}>
          {report.issues.length === 0
            ? '✓ No convention issues found'
            : `✗ ${report.errorCount} error(s), ${report.warningCount} warning(s)`}
        </Text>
      </Box>
    </Box>
  );
};
