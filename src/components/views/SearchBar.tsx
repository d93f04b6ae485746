import { Box, Text } from "ink";
import React from "react";
import type { Mode } from "../../types/domain";

interface SearchBarProps {
  mode: Mode;
  unitQuery: string;
  logQuery: string;
}

export const SearchBar: React.FC<SearchBarProps> = ({ mode, unitQuery, logQuery }) => {
  if (mode !== "search" && mode !== "log-search") return null;
  const query = mode === "search" ? unitQuery : logQuery;

  return (
    <Box>
      <Text color="yellow">{mode === "search" ? "Search units" : "Search logs"} /</Text>
      <Text>{query}</Text>
      <Text inverse> </Text>
      <Text dimColor>  Enter/Esc to finish</Text>
    </Box>
  );
};
