import React from 'react';
import {Box, Text} from 'ink';

export type HelpProps = {
  version: string;
};

const Section: React.FC<{title: string; children: React.ReactNode}> = ({title, children}) => (
  <Box marginTop={1}>
    <Box width={16}>
      <Text color="green" bold>
        {title}
      </Text>
    </Box>
    <Box flexShrink={1}>
      <Text>{children}</Text>
    </Box>
  </Box>
);

const Help: React.FC<HelpProps> = ({version}) => (
  <Box flexDirection="column" paddingX={2} paddingY={1} borderStyle="round" borderColor="magenta">
    <Box justifyContent="center">
      <Text color="magentaBright" bold>
        sysdeck {version}
      </Text>
    </Box>
    <Section title="GENERAL">
      <Text color="cyan">/</Text> search • <Text color="cyan">?</Text> help • <Text color="cyan">q</Text> quit •{' '}
      <Text color="cyan">u</Text> user/system • <Text color="cyan">r</Text> reload
    </Section>
    <Section title="UNITS">
      <Text color="cyan">j/k</Text> move • <Text color="cyan">g/G</Text> top/bottom • <Text color="cyan">l</Text> logs •{' '}
      <Text color="cyan">i/Enter</Text> details • <Text color="cyan">c</Text> unit file
    </Section>
    <Section title="FILTERS">
      <Text color="cyan">s</Text> status • <Text color="cyan">f</Text> file state • <Text color="cyan">t</Text> unit type •{' '}
      <Text color="cyan">p</Text> severity • <Text color="cyan">T</Text> time range
    </Section>
    <Section title="LOGS">
      <Text color="cyan">j/k</Text> scroll • <Text color="cyan">Ctrl+U/D</Text> half page • <Text color="cyan">n/N</Text> next/prev
      match • <Text color="cyan">F</Text> live tail • <Text color="cyan">Esc</Text> back
    </Section>
    <Section title="ACTIONS">
      <Text color="cyan">a</Text> action menu • <Text color="cyan">D</Text> daemon reload
    </Section>
    <Box marginTop={1}>
      <Text dimColor>Press any key to close</Text>
    </Box>
  </Box>
);

export default Help;
