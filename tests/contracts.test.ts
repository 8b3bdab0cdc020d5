// Contract tests: the decoder accepts the shapes the assistant CLI prints

import { describe, it, expect } from "vitest";
import { decodeLine } from "../src/protocol";
import type { AssistantStreamMessage } from "../src/types";
import * as fixtures from "./fixtures/events";

function decode(value: unknown): AssistantStreamMessage {
  return decodeLine(JSON.stringify(value));
}

describe("Stream message contracts", () => {
  describe("system", () => {
    it("keeps session, model and tool list", () => {
      const message = decode(fixtures.systemInit);
      expect(message.type).toBe("system");
      if (message.type === "system") {
        expect(message.subtype).toBe("init");
        expect(message.session_id).toBe("sess-0001");
        expect(message.model).toBe("test-model");
        expect(message.tools).toEqual(["Bash", "Read", "Write"]);
        expect(message.cwd).toBe("/home/test/project");
      }
    });

    it("accepts a minimal system message", () => {
      expect(decode({ type: "system", model: "x" })).toEqual({ type: "system", model: "x" });
    });
  });

  describe("assistant", () => {
    it("text content", () => {
      const message = decode(fixtures.assistantText);
      expect(message.type).toBe("assistant");
      if (message.type === "assistant") {
        expect(message.message.role).toBe("assistant");
        expect(message.message.content).toEqual([{ type: "text", text: "hi" }]);
        expect(message.session_id).toBe("sess-0001");
      }
    });

    it("tool_use content", () => {
      const message = decode(fixtures.assistantToolUse);
      if (message.type !== "assistant") throw new Error(`unexpected ${message.type}`);
      expect(message.message.content).toEqual([
        { type: "tool_use", id: "t1", name: "Read", input: { path: "Cargo.toml" } },
      ]);
    });

    it("keeps unknown block kinds instead of failing", () => {
      const message = decode({
        type: "assistant",
        message: { content: [{ type: "thinking", thinking: "hmm" }, { type: "text", text: "ok" }] },
      });
      if (message.type !== "assistant") throw new Error(`unexpected ${message.type}`);
      expect(message.message.content[0]).toEqual({
        type: "unknown",
        kind: "thinking",
        raw: { type: "thinking", thinking: "hmm" },
      });
      expect(message.message.content[1]).toEqual({ type: "text", text: "ok" });
    });

    it("exposes context compaction details", () => {
      const message = decode({
        type: "assistant",
        message: { content: [], context_management: { truncated_content_length: 5120 } },
      });
      if (message.type !== "assistant") throw new Error(`unexpected ${message.type}`);
      expect(message.message.context_management?.truncated_content_length).toBe(5120);
    });
  });

  describe("user", () => {
    it("tool_result content", () => {
      const message = decode(fixtures.userToolResult);
      if (message.type !== "user") throw new Error(`unexpected ${message.type}`);
      expect(message.message.content).toEqual([
        { type: "tool_result", tool_use_id: "t1", content: "package name = demo" },
      ]);
    });

    it("structured tool_result content", () => {
      const message = decode({
        type: "user",
        message: {
          content: [{ type: "tool_result", tool_use_id: "t2", content: [{ type: "text", text: "a" }], is_error: true }],
        },
      });
      if (message.type !== "user" || typeof message.message.content === "string") {
        throw new Error("expected block content");
      }
      expect(message.message.content[0]).toEqual({
        type: "tool_result",
        tool_use_id: "t2",
        content: [{ type: "text", text: "a" }],
        is_error: true,
      });
    });
  });

  describe("result", () => {
    it("success result", () => {
      const message = decode(fixtures.successResult);
      if (message.type !== "result") throw new Error(`unexpected ${message.type}`);
      expect(message.subtype).toBe("success");
      expect(message.total_cost_usd).toBe(0.01);
      expect(message.num_turns).toBe(1);
      expect(message.result).toBe("hi");
      expect(message.duration_ms).toBe(1200);
    });

    it("error result", () => {
      const message = decode(fixtures.errorResult);
      if (message.type !== "result") throw new Error(`unexpected ${message.type}`);
      expect(message.is_error).toBe(true);
      expect(message.subtype).toBe("error_during_execution");
    });
  });

  it("every fixture decodes to its own type", () => {
    const samples = [
      fixtures.systemInit,
      fixtures.assistantText,
      fixtures.assistantToolUse,
      fixtures.userToolResult,
      fixtures.successResult,
      fixtures.errorResult,
    ];

    expect(samples.map((sample) => decode(sample).type)).toEqual(samples.map((sample) => sample.type));
  });
});
