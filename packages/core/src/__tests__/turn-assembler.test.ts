/**
 * Tests for turn-assembler.ts
 *
 * Records are built from literal transcript lines through parseRecordLine,
 * the same path the orchestrator uses, so the raw objects in the emitted
 * turns are exactly what a backend would receive.
 */

import { describe, expect, test } from "vitest";
import type { TranscriptRecord } from "@trace-relay/shared";
import { parseRecordLine, textBlocks, toolResultBlocks } from "../record-model.js";
import { assembleTurns, mergeAssistantParts } from "../turn-assembler.js";

// ---------------------------------------------------------------------------
// Line builders
// ---------------------------------------------------------------------------

const user = (text: string) => ({
  type: "user",
  sessionId: "sess-1",
  message: { role: "user", content: text },
});

const assistant = (messageId: string | null, text: string) => ({
  type: "assistant",
  sessionId: "sess-1",
  message:
    messageId === null
      ? { role: "assistant", content: [{ type: "text", text }] }
      : { id: messageId, role: "assistant", content: [{ type: "text", text }] },
});

const toolCall = (messageId: string, toolId: string) => ({
  type: "assistant",
  sessionId: "sess-1",
  message: {
    id: messageId,
    role: "assistant",
    content: [{ type: "tool_use", id: toolId, name: "Bash", input: { command: "ls" } }],
  },
});

const toolResult = (toolId: string) => ({
  type: "user",
  sessionId: "sess-1",
  message: {
    role: "user",
    content: [{ type: "tool_result", tool_use_id: toolId, content: "a.txt" }],
  },
});

function recordsOf(lines: object[], firstLineIndex = 0): TranscriptRecord[] {
  return lines.map((line, i) => parseRecordLine(JSON.stringify(line), firstLineIndex + i));
}

/** Assemble as for the session whose response just finished */
function assemble(lines: object[], startTurnCount = 0) {
  return assembleTurns(recordsOf(lines), {
    sessionId: "sess-1",
    projectName: "demo",
    startTurnCount,
    totalLines: lines.length,
    closeTrailingTurn: true,
  });
}

/** Concatenated text of one assistant message */
const joinedText = (raw: Parameters<typeof textBlocks>[0]) =>
  textBlocks(raw)
    .map((block) => block.text)
    .join("");

// ---------------------------------------------------------------------------
// Turn boundaries
// ---------------------------------------------------------------------------

describe("assembleTurns: boundaries", () => {
  test("multi-part response is merged and user lines split turns", () => {
    const { turns, consumedLines } = assemble([
      user("A"),
      assistant("msg_1", "hi"),
      assistant("msg_1", " there"),
      user("B"),
      assistant("msg_2", "ok"),
    ]);

    expect(turns).toHaveLength(2);
    expect(consumedLines).toBe(5);

    const [first, second] = turns;
    expect(first.turnNumber).toBe(1);
    expect(first.userMessage).toEqual(user("A"));
    expect(first.assistantMessages).toHaveLength(1);
    expect(joinedText(first.assistantMessages[0])).toBe("hi there");

    expect(second.turnNumber).toBe(2);
    expect(second.userMessage).toEqual(user("B"));
    expect(second.assistantMessages).toHaveLength(1);
    expect(joinedText(second.assistantMessages[0])).toBe("ok");
  });

  test("turn numbers continue from the start count", () => {
    const { turns } = assemble(
      [user("A"), assistant("m1", "x"), user("B"), assistant("m2", "y")],
      5,
    );
    expect(turns.map((t) => t.turnNumber)).toEqual([6, 7]);
  });

  test("turns carry session and project", () => {
    const { turns } = assemble([user("A"), assistant("m1", "x")]);
    expect(turns[0].sessionId).toBe("sess-1");
    expect(turns[0].projectName).toBe("demo");
  });

  test("end of stream closes a turn that has a reply when asked to", () => {
    const { turns, consumedLines } = assemble([user("A"), assistant("msg_1", "partial")]);
    expect(turns).toHaveLength(1);
    expect(consumedLines).toBe(2);
  });

  test("assistant lines with different ids become separate messages", () => {
    const { turns } = assemble([
      user("A"),
      assistant("m1", "one"),
      assistant("m2", "two"),
    ]);
    expect(turns[0].assistantMessages.map(joinedText)).toEqual(["one", "two"]);
  });

  test("assistant without message id stands alone between accumulations", () => {
    const { turns } = assemble([
      user("A"),
      assistant("m1", "x"),
      assistant(null, "y"),
      assistant("m1", "z"),
    ]);
    expect(turns[0].assistantMessages.map(joinedText)).toEqual(["x", "y", "z"]);
    // The standalone line is passed through untouched
    expect(turns[0].assistantMessages[1]).toEqual(assistant(null, "y"));
  });

  test("malformed lines are skipped", () => {
    const records = [
      parseRecordLine(JSON.stringify(user("A")), 0),
      parseRecordLine("{not json", 1),
      parseRecordLine(JSON.stringify({ type: "progress" }), 2),
      parseRecordLine(JSON.stringify(assistant("m1", "x")), 3),
    ];
    const { turns, consumedLines } = assembleTurns(records, {
      sessionId: "sess-1",
      projectName: "demo",
      startTurnCount: 0,
      totalLines: 4,
      closeTrailingTurn: true,
    });
    expect(turns).toHaveLength(1);
    expect(consumedLines).toBe(4);
  });

  test("assistant lines before any user line are dropped", () => {
    const { turns } = assemble([assistant("m0", "orphan"), user("A"), assistant("m1", "x")]);
    expect(turns).toHaveLength(1);
    expect(turns[0].assistantMessages.map(joinedText)).toEqual(["x"]);
  });

  test("a user line followed by a user line emits nothing for the first", () => {
    const { turns } = assemble([user("A"), user("B"), assistant("m1", "x")]);
    expect(turns).toHaveLength(1);
    expect(turns[0].userMessage).toEqual(user("B"));
    expect(turns[0].turnNumber).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Tool results
// ---------------------------------------------------------------------------

describe("assembleTurns: tool results", () => {
  test("tool result lands in the turn that made the call", () => {
    const { turns } = assemble([
      user("A"),
      toolCall("m1", "42"),
      toolResult("42"),
      user("B"),
      assistant("m2", "done"),
    ]);

    expect(turns).toHaveLength(2);
    expect(turns[0].toolResults).toHaveLength(1);
    expect(toolResultBlocks(turns[0].toolResults[0])[0].tool_use_id).toBe("42");
    expect(turns[1].toolResults).toEqual([]);
  });

  test("tool result lines do not close the assistant accumulation", () => {
    const { turns } = assemble([
      user("A"),
      toolCall("m1", "7"),
      toolResult("7"),
      assistant("m1", "after tool"),
    ]);
    expect(turns[0].assistantMessages).toHaveLength(1);
    expect(turns[0].toolResults).toHaveLength(1);
  });

  test("a result arriving after the next user line goes to the later turn", () => {
    const { turns } = assemble([
      user("A"),
      toolCall("m1", "9"),
      user("B"),
      toolResult("9"),
      assistant("m2", "ok"),
    ]);
    expect(turns[0].toolResults).toEqual([]);
    expect(turns[1].toolResults).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Deferred trailing turn
// ---------------------------------------------------------------------------

describe("assembleTurns: pending reply", () => {
  test("trailing user line without a reply is handed back", () => {
    const { turns, consumedLines } = assemble([
      user("A"),
      assistant("m1", "x"),
      user("B"),
    ]);
    expect(turns).toHaveLength(1);
    expect(consumedLines).toBe(2);
  });

  test("a lone user line consumes nothing", () => {
    const { turns, consumedLines } = assemble([user("A")]);
    expect(turns).toEqual([]);
    expect(consumedLines).toBe(0);
  });

  test("next pass numbers the deferred turn from the unchanged count", () => {
    const lines = [user("A"), assistant("m1", "x"), user("B")];
    const first = assemble(lines);
    expect(first.turns).toHaveLength(1);

    // Reply to B arrives; the next pass starts at the handed-back line
    const all = [...lines, assistant("m2", "y")];
    const startLine = first.consumedLines;
    const second = assembleTurns(recordsOf(all.slice(startLine), startLine), {
      sessionId: "sess-1",
      projectName: "demo",
      startTurnCount: first.turns.length,
      totalLines: all.length - startLine,
      firstLineIndex: startLine,
      closeTrailingTurn: true,
    });

    expect(second.turns).toHaveLength(1);
    expect(second.turns[0].turnNumber).toBe(2);
    expect(second.turns[0].userMessage).toEqual(user("B"));
    expect(second.consumedLines).toBe(2);
  });

  test("handed-back line is relative to the batch start", () => {
    const records = recordsOf([user("A"), assistant("m1", "x"), user("B")], 10);
    const { consumedLines } = assembleTurns(records, {
      sessionId: "sess-1",
      projectName: "demo",
      startTurnCount: 0,
      totalLines: 3,
      firstLineIndex: 10,
    });
    expect(consumedLines).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Open trailing turn
// ---------------------------------------------------------------------------

describe("assembleTurns: open trailing turn", () => {
  const open = (lines: object[], firstLineIndex = 0) =>
    assembleTurns(recordsOf(lines, firstLineIndex), {
      sessionId: "sess-1",
      projectName: "demo",
      startTurnCount: 0,
      totalLines: lines.length,
      firstLineIndex,
    });

  test("a reply in progress is not emitted and its user line is handed back", () => {
    const { turns, consumedLines } = open([user("A"), assistant("msg_1", "partial")]);
    expect(turns).toEqual([]);
    expect(consumedLines).toBe(0);
  });

  test("earlier turns are still emitted", () => {
    const { turns, consumedLines } = open([
      user("A"),
      assistant("m1", "x"),
      user("B"),
      toolCall("m2", "t1"),
    ]);
    expect(turns.map((turn) => turn.turnNumber)).toEqual([1]);
    expect(consumedLines).toBe(2);
  });

  test("re-reading from the handed-back line keeps the tool result and final text together", () => {
    const firstBatch = [user("fix it"), toolCall("m1", "t1")];
    const first = open(firstBatch);
    expect(first.turns).toEqual([]);

    const all = [...firstBatch, toolResult("t1"), assistant("m2", "FINAL ANSWER")];
    const startLine = first.consumedLines;
    const second = assembleTurns(recordsOf(all.slice(startLine), startLine), {
      sessionId: "sess-1",
      projectName: "demo",
      startTurnCount: 0,
      totalLines: all.length - startLine,
      firstLineIndex: startLine,
      closeTrailingTurn: true,
    });

    expect(second.turns).toHaveLength(1);
    const [turn] = second.turns;
    expect(turn.turnNumber).toBe(1);
    expect(turn.toolResults).toHaveLength(1);
    expect(turn.assistantMessages.map(joinedText)).toEqual(["", "FINAL ANSWER"]);
    expect(second.consumedLines).toBe(4);
  });

  test("assistant lines with no user line before them are consumed", () => {
    const { turns, consumedLines } = open([assistant("m0", "orphan")]);
    expect(turns).toEqual([]);
    expect(consumedLines).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

describe("assembleTurns: replay", () => {
  test("same records and start count give identical turns", () => {
    const lines = [
      user("A"),
      toolCall("m1", "1"),
      toolResult("1"),
      assistant("m1", "done"),
      user("B"),
      assistant("m2", "ok"),
    ];
    expect(assemble(lines, 3)).toEqual(assemble(lines, 3));
  });
});

// ---------------------------------------------------------------------------
// mergeAssistantParts
// ---------------------------------------------------------------------------

describe("mergeAssistantParts", () => {
  test("keeps block order and the nested message shape", () => {
    const merged = mergeAssistantParts([
      { type: "assistant", message: { id: "m1", model: "claude-x", content: [{ type: "text", text: "a" }] } },
      { type: "assistant", message: { id: "m1", content: "b" } },
      { type: "assistant", message: { id: "m1", content: [{ type: "tool_use", id: "t", name: "Read", input: {} }] } },
    ]);

    expect(merged).toEqual({
      type: "assistant",
      message: {
        id: "m1",
        model: "claude-x",
        content: [
          { type: "text", text: "a" },
          { type: "text", text: "b" },
          { type: "tool_use", id: "t", name: "Read", input: {} },
        ],
      },
    });
  });

  test("keeps top-level content when the first part has no message", () => {
    const merged = mergeAssistantParts([
      { type: "assistant", content: "x" },
      { type: "assistant", content: [{ type: "text", text: "y" }] },
    ]);
    expect(merged).toEqual({
      type: "assistant",
      content: [
        { type: "text", text: "x" },
        { type: "text", text: "y" },
      ],
    });
  });

  test("empty string content adds no block", () => {
    const merged = mergeAssistantParts([{ type: "assistant", content: "" }]);
    expect(merged).toEqual({ type: "assistant", content: [] });
  });

  test("no parts gives an empty object", () => {
    expect(mergeAssistantParts([])).toEqual({});
  });
});
