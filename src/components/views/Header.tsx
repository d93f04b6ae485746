import { Box, Text } from "ink";
import React from "react";
import type { FilterState } from "../../state/filter-reducer";
import type { LogViewportState } from "../../state/log-reducer";
import { categoryLabel, severityLabel, timeRangeLabel } from "../../utils/catalog";

interface HeaderProps {
  version: string;
  filters: FilterState;
  logs: LogViewportState;
}

const Tag: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Text>
    <Text dimColor>{label} </Text>
    <Text color="cyan">{value}</Text>
    <Text dimColor>  </Text>
  </Text>
);

export const Header: React.FC<HeaderProps> = ({ version, filters, logs }) => (
  <Box>
    <Text color="magentaBright" bold>
      sysdeck
    </Text>
    <Text dimColor> v{version}  </Text>
    <Tag label="type" value={categoryLabel(filters.category)} />
    <Tag label="scope" value={filters.scope} />
    {filters.subState && <Tag label="status" value={filters.subState} />}
    {filters.fileState && <Tag label="file" value={filters.fileState} />}
    {logs.severity !== null && (
      <Tag label="severity" value={`≤ ${severityLabel(logs.severity)}`} />
    )}
    {logs.timeRange !== "all" && <Tag label="since" value={timeRangeLabel(logs.timeRange)} />}
  </Box>
);
