import { describe, it, expect, vi } from "vitest";
import { BestEffortActuation, ConsoleActuationSink } from "../actuation-sink.ts";
import type { ActuationSink } from "../actuation-sink.ts";
import { ActuationError } from "../errors.ts";
import { CONFIDENCE_BEHAVIORS } from "../confidence.ts";
import { captureLogger } from "./log-capture.ts";
import type { CapturedEntry } from "./log-capture.ts";

function makeSink() {
  return {
    speak: vi.fn<ActuationSink["speak"]>(),
    performGesture: vi.fn<ActuationSink["performGesture"]>(),
    performExpression: vi.fn<ActuationSink["performExpression"]>(),
    attend: vi.fn<ActuationSink["attend"]>(),
  };
}

describe("BestEffortActuation", () => {
  it("reports false for every call when there is no sink", async () => {
    const actuation = new BestEffortActuation(null, { logger: captureLogger() });
    expect(actuation.hasSink()).toBe(false);
    expect(await actuation.speak("Hello.")).toBe(false);
    expect(await actuation.attend(0, 0, 1)).toBe(false);
  });

  it("forwards calls to the sink", async () => {
    const sink = makeSink();
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });
    expect(await actuation.speak("Hello.")).toBe(true);
    expect(sink.speak).toHaveBeenCalledWith("Hello.");
  });

  it("logs and reports a failing call without throwing", async () => {
    const sink = makeSink();
    sink.performGesture.mockRejectedValue(new Error("servo stalled"));
    const entries: CapturedEntry[] = [];
    const onError = vi.fn();
    const actuation = new BestEffortActuation(sink, { logger: captureLogger(entries), onError });

    expect(await actuation.performGesture("nod head")).toBe(false);

    expect(entries.filter((e) => e.level === "warn").map((e) => e.message)).toEqual([
      "[Actuation] Failed to gesture nod head: servo stalled",
    ]);
    expect(onError).toHaveBeenCalledTimes(1);
    const error: unknown = onError.mock.calls[0][0];
    expect(error).toBeInstanceOf(ActuationError);
    expect(error).toHaveProperty("action", "gesture nod head");
  });

  it("treats a synchronous throw like a rejection", async () => {
    const sink = makeSink();
    sink.speak.mockImplementation(() => {
      throw new Error("muted");
    });
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });
    expect(await actuation.speak("Hello.")).toBe(false);
  });

  it("performs every part of a behaviour step", async () => {
    const sink = makeSink();
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });

    await actuation.performStep({ gesture: "nod head", expression: "Oh", lookAt: { x: 0.1, y: 0.3, z: 1 } });

    expect(sink.performGesture).toHaveBeenCalledWith("nod head");
    expect(sink.performExpression).toHaveBeenCalledWith("Oh");
    expect(sink.attend).toHaveBeenCalledWith(0.1, 0.3, 1);
  });

  it("skips the parts a step leaves out", async () => {
    const sink = makeSink();
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });

    await actuation.performStep({ expression: "Thoughtful" });

    expect(sink.performGesture).not.toHaveBeenCalled();
    expect(sink.attend).not.toHaveBeenCalled();
    expect(sink.performExpression).toHaveBeenCalledWith("Thoughtful");
  });

  it("still runs the other parts of a step when one fails", async () => {
    const sink = makeSink();
    sink.performGesture.mockRejectedValue(new Error("servo stalled"));
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });

    await actuation.performStep({ gesture: "nod head", expression: "Oh" });

    expect(sink.performExpression).toHaveBeenCalledWith("Oh");
  });

  it("performs the gesture and expression of a confidence tier", async () => {
    const sink = makeSink();
    const actuation = new BestEffortActuation(sink, { logger: captureLogger() });

    await actuation.performConfidence(CONFIDENCE_BEHAVIORS.high);

    expect(sink.performGesture).toHaveBeenCalledWith("nod head");
    expect(sink.performExpression).toHaveBeenCalledWith("BigSmile");
    expect(sink.speak).not.toHaveBeenCalled();
  });
});

describe("ConsoleActuationSink", () => {
  it("prints one line per action", () => {
    const lines: string[] = [];
    const sink = new ConsoleActuationSink((line) => lines.push(line));

    sink.speak("Hello.");
    sink.performGesture("nod head");
    sink.performExpression("Oh");
    sink.attend(0, 0.5, 1);

    expect(lines).toEqual(["Robot> Hello.", "  [gesture] nod head", "  [expression] Oh", "  [attend] (0, 0.5, 1)"]);
  });
});
