import { Box, Text } from "ink";
import React from "react";

export type PickerProps = {
  title: string;
  options: readonly string[];
  cursor: number;
  hint?: string;
};

const Picker: React.FC<PickerProps> = ({ title, options, cursor, hint }) => (
  <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
    <Text color="cyan" bold>
      {title}
    </Text>
    {options.map((option, i) => (
      <Text key={option} inverse={i === cursor}>
        {i === cursor ? "› " : "  "}
        {option}
      </Text>
    ))}
    <Text dimColor>{hint ?? "j/k move • Enter select • Esc cancel"}</Text>
  </Box>
);

export default Picker;
