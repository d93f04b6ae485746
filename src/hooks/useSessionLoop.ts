import { useEffect, useRef } from "react";
import { type AppAction, appStateReducer, useAppState } from "../contexts/AppStateContext";
import type { SessionDriver } from "../services/session-driver";
import { createStatusService } from "../services/status-service";

/**
 * Drives the session: one driver step per wake-up, sleeping in between for
 * as long as the driver allows. State changes and settled background work
 * both wake it early.
 */
export function useSessionLoop(driver: SessionDriver) {
  const { state, dispatch } = useAppState();
  const stateRef = useRef(state);
  stateRef.current = state;

  const timer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const wakeRef = useRef<() => void>(() => {});

  useEffect(() => {
    let stopped = false;

    const schedule = (delay: number) => {
      if (stopped) return;
      if (timer.current) clearTimeout(timer.current);
      timer.current = setTimeout(tick, delay);
    };

    // Keep the ref ahead of React so a step never acts on state it already changed
    const track = (action: AppAction) => {
      stateRef.current = appStateReducer(stateRef.current, action);
      dispatch(action);
    };

    const tick = () => {
      timer.current = null;
      const delay = driver.step(() => stateRef.current, Date.now(), track);
      schedule(delay);
    };

    wakeRef.current = () => schedule(0);
    driver.onWake(() => schedule(0));
    driver.setStatusService(
      createStatusService((status) => track({ type: "SET_STATUS", payload: status }), "session"),
    );
    schedule(0);

    return () => {
      stopped = true;
      driver.onWake(null);
      if (timer.current) clearTimeout(timer.current);
      timer.current = null;
    };
  }, [driver, dispatch]);

  useEffect(() => {
    wakeRef.current();
  }, [state]);
}
