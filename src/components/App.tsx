import { useApp, useInput } from "ink";
import React, { useEffect, useMemo } from "react";
import { InputRegistry } from "../commands/registry";
import { defaultInputHandlers } from "../commands/handlers/keyboard";
import type { CommandContext } from "../commands/types";
import { useAppState } from "../contexts/AppStateContext";
import { useSessionLoop } from "../hooks/useSessionLoop";
import type { SessionDriver } from "../services/session-driver";
import { createStatusService } from "../services/status-service";
import { MainLayout } from "./views/MainLayout";

export interface AppProps {
  driver: SessionDriver;
  version: string;
  /** Restores the terminal; called once before Ink unmounts. */
  onExit?: () => void;
}

export const App: React.FC<AppProps> = ({ driver, version, onExit }) => {
  const { exit } = useApp();
  const { state, dispatch } = useAppState();

  const registry = useMemo(() => {
    const r = new InputRegistry();
    for (const handler of defaultInputHandlers()) r.registerInputHandler(handler);
    return r;
  }, []);

  const statusLog = useMemo(
    () => createStatusService((status) => dispatch({ type: "SET_STATUS", payload: status }), "input"),
    [dispatch],
  );

  useEffect(() => {
    const onResize = () => {
      dispatch({
        type: "SET_TERMINAL_SIZE",
        payload: { rows: process.stdout.rows || 24, cols: process.stdout.columns || 80 },
      });
    };
    process.stdout.on("resize", onResize);
    return () => {
      process.stdout.off("resize", onResize);
    };
  }, [dispatch]);

  useSessionLoop(driver);

  useInput((input, key) => {
    const context: CommandContext = {
      state,
      dispatch,
      statusLog,
      session: {
        executePending: () => driver.executePending(state, dispatch),
        dismissPending: () => driver.dismissPending(dispatch),
      },
      cleanupAndExit: () => {
        onExit?.();
        exit();
      },
    };
    registry.handleInput(input, key, context);
  });

  return <MainLayout version={version} />;
};
