import { describe, expect, it } from "vitest";
import { createClock } from "../testing/fakes";
import { backoffDelay } from "./backoff";
import { RunController } from "./cancellation";

describe("backoffDelay", () => {
  it("doubles from the base and caps at the maximum", () => {
    expect([1, 2, 3, 4, 5].map((retry) => backoffDelay(retry, 500, 4000))).toEqual([500, 1000, 2000, 4000, 4000]);
  });
});

describe("RunController", () => {
  it("reports the first stop reason", () => {
    const controller = new RunController();
    expect(controller.isCancelled()).toBe(false);

    controller.stop("interrupted");
    controller.stop("second");

    expect(controller.isCancelled()).toBe(true);
    expect(controller.reason()).toBe("interrupted");
  });

  it("cancels once the deadline is reached", () => {
    const clock = createClock();
    const controller = new RunController({ deadline: new Date("2024-05-01T12:30:00.000Z"), now: clock.now });

    clock.advance(29 * 60_000);
    expect(controller.isCancelled()).toBe(false);

    clock.advance(60_000);
    expect(controller.reason()).toBe("deadline 2024-05-01T12:30:00.000Z reached");
  });

  it("refuses new starts at the limit without cancelling", () => {
    const controller = new RunController({ maxApplications: 2 });

    expect(controller.tryStartApplication()).toBe(true);
    expect(controller.tryStartApplication()).toBe(true);
    expect(controller.tryStartApplication()).toBe(false);
    expect(controller.limitReached()).toBe(true);
    expect(controller.isCancelled()).toBe(false);

    controller.releaseApplication();
    expect(controller.startedCount()).toBe(1);
    expect(controller.tryStartApplication()).toBe(true);
  });

  it("refuses new starts after a stop", () => {
    const controller = new RunController();
    controller.stop();

    expect(controller.tryStartApplication()).toBe(false);
    expect(controller.reason()).toBe("stop requested");
  });
});
