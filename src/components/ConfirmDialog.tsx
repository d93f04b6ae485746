import { Box, Text } from "ink";
import React from "react";
import type { PendingActionState } from "../state/action-reducer";
import { actionProgressLabel, confirmationMessage } from "../utils/catalog";

export type ConfirmDialogProps = {
  pending: PendingActionState;
  indicatorOn: boolean;
};

const ConfirmDialog: React.FC<ConfirmDialogProps> = ({ pending, indicatorOn }) => {
  if (pending.phase === "idle") return null;

  let body: React.ReactNode = null;
  let hint = "";
  let border = "yellow";

  switch (pending.phase) {
    case "confirming":
      body = <Text>{confirmationMessage(pending.action, pending.unitName)}</Text>;
      hint = "y/Enter confirm • n/Esc cancel";
      break;
    case "executing":
      body = (
        <Text>
          <Text color="yellow">{indicatorOn ? "●" : " "}</Text> {actionProgressLabel(pending.action)}
        </Text>
      );
      hint = "Esc dismiss";
      break;
    case "settled":
      border = pending.outcome.ok ? "green" : "red";
      body = (
        <Text color={border} wrap="wrap">
          {pending.outcome.ok ? "✓ " : "✗ "}
          {pending.outcome.message}
        </Text>
      );
      hint = "Enter/Esc close";
      break;
  }

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={border} paddingX={2} paddingY={1}>
      {body}
      <Box marginTop={1}>
        <Text dimColor>{hint}</Text>
      </Box>
    </Box>
  );
};

export default ConfirmDialog;
