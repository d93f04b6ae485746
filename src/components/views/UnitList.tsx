import { Box, Text } from "ink";
import React from "react";
import type { FilterState } from "../../state/filter-reducer";
import { colorFor, truncate } from "../../utils/formatters";
import { listWindowStart } from "../../utils/layout";

const COL = {
  name: 40,
  sub: 11,
  file: 10,
  detail: 22,
} as const;

interface UnitListProps {
  filters: FilterState;
  rows: number;
  cols: number;
  focused: boolean;
}

const pad = (text: string, width: number) => truncate(text, width).padEnd(width);

export const UnitList: React.FC<UnitListProps> = ({ filters, rows, cols, focused }) => {
  const { filteredIndices, units, selectedIdx } = filters;
  const start = listWindowStart(selectedIdx, filteredIndices.length, rows);
  const shown = filteredIndices.slice(start, start + rows);
  const descWidth = Math.max(0, cols - COL.name - COL.sub - COL.file - COL.detail - 4);

  let body: React.ReactNode;
  if (filters.fetchError) {
    body = (
      <Text color="red" wrap="truncate-end">
        {filters.fetchError} (press r to retry)
      </Text>
    );
  } else if (filters.loading && units.length === 0) {
    body = <Text dimColor>Loading units…</Text>;
  } else if (shown.length === 0) {
    body = <Text dimColor>No matching units</Text>;
  } else {
    body = shown.map((unitIdx, i) => {
      const unit = units[unitIdx];
      const selected = start + i === selectedIdx;
      return (
        <Box key={unit.name}>
          <Text inverse={selected} bold={selected && focused} wrap="truncate-end">
            {pad(unit.name, COL.name)}{" "}
            <Text {...colorFor(unit.subState)}>{pad(unit.subState, COL.sub)}</Text>{" "}
            {pad(unit.fileState ?? "", COL.file)} {pad(unit.detail ?? "", COL.detail)}{" "}
            <Text dimColor>{truncate(unit.description, descWidth)}</Text>
          </Text>
        </Box>
      );
    });
  }

  return (
    <Box flexDirection="column">
      <Text bold dimColor wrap="truncate-end">
        {pad("UNIT", COL.name)} {pad("STATUS", COL.sub)} {pad("FILE", COL.file)}{" "}
        {pad("DETAIL", COL.detail)} DESCRIPTION
      </Text>
      {body}
    </Box>
  );
};
