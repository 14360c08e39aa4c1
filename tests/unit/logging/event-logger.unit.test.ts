import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { createEventLogger } from "../../../src/logging/event-logger";
import type { LogEvent } from "../../../src/logging/event-logger";

const capture = () => {
  const stream = new PassThrough();
  let output = "";
  stream.on("data", (chunk: Buffer) => {
    output += chunk.toString("utf-8");
  });
  return { stream, read: () => output };
};

describe("logging", () => {
  describe("event-logger", () => {
    it("should emit stable JSONL with sorted keys", () => {
      const { stream, read } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "jsonl" });

      logger.emitEvent({
        event: "scenario-failed",
        scenarioId: "get-static",
        stage: "connect",
        code: "ECONNREFUSED",
        message: "connect ECONNREFUSED 127.0.0.1:8080",
      });

      expect(read()).toBe(
        '{"code":"ECONNREFUSED","event":"scenario-failed","message":"connect ECONNREFUSED 127.0.0.1:8080","scenarioId":"get-static","stage":"connect"}\n'
      );
    });

    it("should drop undefined fields from JSONL", () => {
      const { stream, read } = capture();
      const logger = createEventLogger({ mode: "ci", stream });

      logger.emitEvent({
        event: "response-received",
        scenarioId: "missing-version",
        termination: "timeout",
        bytes: 0,
        status: undefined,
        text: "",
      });

      expect(read()).toBe(
        '{"bytes":0,"event":"response-received","scenarioId":"missing-version","termination":"timeout","text":""}\n'
      );
    });

    it("should print request text untouched between rules in pretty ci output", () => {
      const { stream, read } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "pretty" });
      const rule = "-".repeat(60);

      logger.emitEvent({
        event: "request-sent",
        scenarioId: "get-static",
        bytes: 18,
        text: "GET / HTTP/1.1\r\n\r\n",
      });

      expect(read()).toBe(
        ["▶ Sending request", " ○ bytes=18", rule, "GET / HTTP/1.1\r\n\r\n", rule].join("\n") + "\n"
      );
    });

    it("should print a partial response under a failure in pretty ci output", () => {
      const { stream, read } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "pretty" });
      const rule = "-".repeat(60);

      logger.emitEvent({
        event: "scenario-failed",
        scenarioId: "upload-large",
        stage: "io",
        code: "ECONNRESET",
        message: "read ECONNRESET",
        bytes: 34,
        status: 413,
        text: "HTTP/1.1 413 Payload Too Large\r\n\r\n",
      });

      expect(read()).toBe(
        [
          "✖ Scenario failed",
          " ○ id=upload-large",
          " ○ stage=io",
          " ○ code=ECONNRESET",
          " ○ message=read ECONNRESET",
          " ○ bytes=34",
          " ○ status=413",
          rule,
          "HTTP/1.1 413 Payload Too Large\r\n\r\n",
          rule,
        ].join("\n") + "\n"
      );
    });

    it("should notify subscribers of every event", () => {
      const { stream } = capture();
      const logger = createEventLogger({ mode: "ci", stream });
      const seen: LogEvent[] = [];
      logger.onEvent((event) => seen.push(event));

      logger.emitEvent({ event: "startup-failed", message: "boom" });

      expect(seen).toEqual([{ event: "startup-failed", message: "boom" }]);
    });
  });
});
