import { Box, Text } from "ink";
import React from "react";
import type { DetailLine } from "../utils/details";

export type DetailsModalProps = {
  unitName: string;
  lines: readonly DetailLine[];
  scroll: number;
  rows: number;
};

const LABEL_WIDTH = 14;

const DetailsModal: React.FC<DetailsModalProps> = ({ unitName, lines, scroll, rows }) => {
  const shown = lines.slice(scroll, scroll + rows);
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} flexGrow={1}>
      <Text color="cyan" bold>
        {unitName}
      </Text>
      {shown.map((line, i) =>
        line.heading ? (
          <Text key={`${scroll + i}`} color="green" bold>
            {line.label}
          </Text>
        ) : (
          <Text key={`${scroll + i}`} wrap="truncate-end">
            <Text dimColor>{line.label.padEnd(LABEL_WIDTH)}</Text>
            {line.value}
          </Text>
        ),
      )}
      <Text dimColor>
        {lines.length > rows ? `${scroll + 1}-${Math.min(scroll + rows, lines.length)}/${lines.length} • ` : ""}
        j/k scroll • Esc close
      </Text>
    </Box>
  );
};

export default DetailsModal;
