import { render } from "ink-testing-library";
import { describe, expect, it } from "vitest";
import ConfirmDialog from "../../components/ConfirmDialog";
import { stripAnsi } from "../test-utils";

describe("ConfirmDialog UI", () => {
  it("renders nothing when no action is pending", () => {
    const { lastFrame } = render(<ConfirmDialog pending={{ phase: "idle" }} indicatorOn={false} />);
    expect(lastFrame()).toBe("");
  });

  it("asks before running", () => {
    const { lastFrame } = render(
      <ConfirmDialog pending={{ phase: "confirming", action: "restart", unitName: "nginx.service" }} indicatorOn />,
    );
    const frame = stripAnsi(lastFrame() ?? "");
    expect(frame).toContain("Restart nginx.service?");
    expect(frame).toContain("y/Enter confirm • n/Esc cancel");
  });

  it("blinks the progress indicator while executing", () => {
    const pending = { phase: "executing", action: "stop", unitName: "nginx.service", invocation: 1 } as const;
    const on = stripAnsi(render(<ConfirmDialog pending={pending} indicatorOn />).lastFrame() ?? "");
    const off = stripAnsi(render(<ConfirmDialog pending={pending} indicatorOn={false} />).lastFrame() ?? "");
    expect(on).toContain("● Stopping...");
    expect(off).not.toContain("●");
    expect(off).toContain("Stopping...");
  });

  it("shows the outcome", () => {
    const { lastFrame } = render(
      <ConfirmDialog
        pending={{
          phase: "settled",
          action: "start",
          unitName: "nginx.service",
          invocation: 2,
          outcome: { ok: false, message: "Start failed: unit masked" },
        }}
        indicatorOn={false}
      />,
    );
    const frame = stripAnsi(lastFrame() ?? "");
    expect(frame).toContain("✗ Start failed: unit masked");
    expect(frame).toContain("Enter/Esc close");
  });
});
