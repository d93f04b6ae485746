import { Box, Text } from "ink";
import React from "react";
import type { UnitFileView } from "../state/modal-reducer";

export type UnitFileViewerProps = {
  view: UnitFileView;
  rows: number;
};

const UnitFileViewer: React.FC<UnitFileViewerProps> = ({ view, rows }) => {
  let body: React.ReactNode;
  if (view.error) {
    body = <Text color="red">{view.error}</Text>;
  } else if (view.lines === null) {
    body = <Text dimColor>Loading unit file…</Text>;
  } else {
    body = view.lines.slice(view.scroll, view.scroll + rows).map((line, i) => (
      <Text key={view.scroll + i} color={line.startsWith("#") ? "gray" : undefined} wrap="truncate-end">
        {line || " "}
      </Text>
    ));
  }

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} flexGrow={1}>
      <Text color="cyan" bold>
        {view.unitName}
      </Text>
      {body}
      <Text dimColor>j/k scroll • c/Esc close</Text>
    </Box>
  );
};

export default UnitFileViewer;
