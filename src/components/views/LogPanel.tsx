import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import { hardWrap, markerText } from "../../services/log-viewport";
import { type LogViewportState, visibleWindow } from "../../state/log-reducer";
import { colorForSeverity, formatLogLine } from "../../utils/formatters";

interface LogPanelProps {
  logs: LogViewportState;
  focused: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Mark every occurrence of `query` in `line`, ignoring case. */
export function highlightMatches(line: string, query: string, current: boolean): string {
  if (!query) return line;
  const paint = current ? chalk.black.bgMagenta : chalk.black.bgYellow;
  return line.replace(new RegExp(escapeRegExp(query), "gi"), (m) => paint(m));
}

function title(logs: LogViewportState): string {
  const parts = [`Logs: ${logs.unitName ?? "-"}`];
  parts.push(logs.liveTail ? "[live]" : "[paused]");
  const { query, matches, current } = logs.search;
  if (query) {
    const position = current === null ? 0 : current + 1;
    parts.push(`/${query} (${position}/${matches.length})`);
  }
  return parts.join("  ");
}

export const LogPanel: React.FC<LogPanelProps> = ({ logs, focused }) => {
  const { start, end } = visibleWindow(logs);
  const { query, matches, current } = logs.search;
  const currentRecord = current === null ? -1 : matches[current];

  const lines: React.ReactNode[] = [];
  for (let i = start; i < end; i++) {
    const record = logs.records[i];
    const marker = logs.markers[i];
    if (marker) {
      lines.push(
        <Text key={`m${i}`} color="yellow" dimColor>
          {markerText(marker)}
        </Text>,
      );
    }
    hardWrap(formatLogLine(record), logs.viewport.cols).forEach((chunk, j) => {
      lines.push(
        <Text key={`r${i}-${j}`} {...colorForSeverity(record.severity)} wrap="truncate-end">
          {highlightMatches(chunk, query, i === currentRecord)}
        </Text>,
      );
    });
  }

  let empty: string | null = null;
  if (logs.unitName === null) empty = "No unit selected";
  else if (logs.loading) empty = "Loading logs…";
  else if (logs.records.length === 0) empty = "No log entries";

  return (
    <Box flexDirection="column">
      <Text bold={focused} color={focused ? "cyan" : undefined} wrap="truncate-end">
        {title(logs)}
      </Text>
      {empty ? <Text dimColor>{empty}</Text> : lines}
    </Box>
  );
};
