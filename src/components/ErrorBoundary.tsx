import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { logReactError } from '../services/error-handler';
import { getLogger } from '../services/logger';

interface ErrorBoundaryState {
  error: Error | null;
}

interface ErrorBoundaryProps {
  children: React.ReactNode;
  onExit?: (code: number) => void;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    logReactError(error, errorInfo);
  }

  render() {
    if (this.state.error) {
      return (
        <ErrorDisplay
          error={this.state.error}
          logPath={getLogger()?.getLogFilePath() ?? null}
          onExit={this.props.onExit ?? ((code) => process.exit(code))}
        />
      );
    }

    return this.props.children;
  }
}

function ErrorDisplay({
  error,
  logPath,
  onExit,
}: {
  error: Error;
  logPath: string | null;
  onExit: (code: number) => void;
}) {
  const [termRows, setTermRows] = useState(process.stdout.rows || 24);

  useEffect(() => {
    const onResize = () => setTermRows(process.stdout.rows || 24);
    process.stdout.on('resize', onResize);
    return () => {
      process.stdout.off('resize', onResize);
    };
  }, []);

  useInput((input, key) => {
    if (key.escape || input === 'q') {
      onExit(1);
    }
  });

  return (
    <Box flexDirection="column" height={termRows - 1}>
      <Box
        flexDirection="column"
        borderStyle="round"
        borderColor="red"
        paddingX={2}
        paddingY={1}
        flexGrow={1}
      >
        <Box justifyContent="center" marginBottom={1}>
          <Text color="red" bold>Application Error</Text>
        </Box>

        <Box flexDirection="column" marginBottom={1}>
          <Text color="red">Something went wrong while rendering:</Text>
          <Text wrap="wrap">{error.message}</Text>
        </Box>

        {error.stack && (
          <Box flexDirection="column" marginBottom={1}>
            <Text color="gray" dimColor>Stack trace:</Text>
            <Text wrap="wrap" dimColor>{error.stack}</Text>
          </Box>
        )}

        {logPath && <Text dimColor>Session log: {logPath}</Text>}
      </Box>

      <Box paddingX={1} marginTop={1}>
        <Text>Press </Text>
        <Text color="cyan">Q/Esc</Text>
        <Text dimColor> to exit</Text>
      </Box>
    </Box>
  );
}
