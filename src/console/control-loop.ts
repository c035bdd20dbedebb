import type { DispatchTickReport } from "../tasks/dispatcher.js";
import type { ConsoleController } from "./console-controller.js";

export interface ControlLoopHandle {
  stop: () => void;
}

/**
 * Drives the dispatch tick and the view refresh on two timers. The first
 * dispatch tick runs immediately.
 */
export const startControlLoop = ({
  controller,
  dispatchIntervalMs,
  refreshIntervalMs,
  render,
  now = () => Date.now(),
  onTick,
  onError,
}: {
  controller: ConsoleController;
  dispatchIntervalMs: number;
  refreshIntervalMs: number;
  render: () => void;
  now?: () => number;
  onTick?: (report: DispatchTickReport) => void;
  onError: (error: unknown) => void;
}): ControlLoopHandle => {
  const runDispatch = (): void => {
    void controller
      .tick({ now: now() })
      .then((report) => {
        onTick?.(report);
      })
      .catch(onError);
  };
  const runRefresh = (): void => {
    try {
      render();
    } catch (error) {
      onError(error);
    }
  };

  runDispatch();
  runRefresh();
  const dispatchTimer = setInterval(runDispatch, dispatchIntervalMs);
  const refreshTimer = setInterval(runRefresh, refreshIntervalMs);

  return {
    stop: () => {
      clearInterval(dispatchTimer);
      clearInterval(refreshTimer);
    },
  };
};
