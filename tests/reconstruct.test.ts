import { describe, it, expect } from "vitest";
import { reconstructSessions } from "../src/session/reconstruct.js";
import type { Annotation } from "../src/contracts/schemas.js";
import { turn } from "./helpers.js";

function annotation(
  sessionId: string,
  sequenceNo: number,
  label: string,
  timestamp: string,
  annotator = "reviewer-1",
): Annotation {
  return { turnRef: { sessionId, sequenceNo }, label, annotator, timestamp };
}

describe("reconstructSessions", () => {
  it("orders turns by sequence number regardless of arrival order", () => {
    const { narratives, warnings } = reconstructSessions([
      turn("s1", 3, "third"),
      turn("s1", 1, "first"),
      turn("s1", 2, "second"),
    ]);
    expect(narratives.get("s1")?.turns.map((t) => t.sequenceNo)).toEqual([1, 2, 3]);
    expect(warnings).toEqual([]);
  });

  it("groups interleaved sessions and orders them by id", () => {
    const { narratives } = reconstructSessions([
      turn("s2", 0, "b0"),
      turn("s1", 1, "a1"),
      turn("s2", 1, "b1"),
      turn("s1", 0, "a0"),
    ]);
    expect([...narratives.keys()]).toEqual(["s1", "s2"]);
    expect(narratives.get("s2")?.turns.map((t) => t.payload)).toEqual(["b0", "b1"]);
  });

  it("overlays annotations onto their turns in timestamp order", () => {
    const { narratives, warnings } = reconstructSessions(
      [turn("s1", 0, "hello", "input"), turn("s1", 1, "call tool")],
      [
        annotation("s1", 1, "unsafe", "2025-02-01T10:05:00.000Z"),
        annotation("s1", 1, "escalated", "2025-02-01T10:01:00.000Z", "reviewer-2"),
      ],
    );
    expect(warnings).toEqual([]);
    expect(narratives.get("s1")?.turns[0]?.annotations).toEqual([]);
    expect(narratives.get("s1")?.turns[1]?.annotations).toEqual([
      { label: "escalated", annotator: "reviewer-2", timestamp: "2025-02-01T10:01:00.000Z" },
      { label: "unsafe", annotator: "reviewer-1", timestamp: "2025-02-01T10:05:00.000Z" },
    ]);
  });

  it("reports annotations that reference missing turns", () => {
    const { warnings } = reconstructSessions(
      [turn("s1", 0, "hello")],
      [annotation("s1", 7, "late", "2025-02-01T10:00:00.000Z")],
    );
    expect(warnings).toEqual([
      {
        kind: "annotation_unmatched",
        sessionId: "s1",
        sequenceNo: 7,
        message: 'Annotation "late" by reviewer-1 references missing turn s1#7',
      },
    ]);
  });

  it("keeps duplicate sequence numbers and flags them", () => {
    const { narratives, warnings } = reconstructSessions([turn("s1", 1, "a"), turn("s1", 1, "b")]);
    expect(narratives.get("s1")?.turns.map((t) => t.payload)).toEqual(["a", "b"]);
    expect(warnings).toEqual([
      {
        kind: "duplicate_sequence",
        sessionId: "s1",
        sequenceNo: 1,
        message: "Session s1 has more than one turn with sequence number 1",
      },
    ]);
  });

  it("does not mutate its input", () => {
    const input = [turn("s1", 2, "b"), turn("s1", 1, "a")];
    reconstructSessions(input);
    expect(input.map((t) => t.sequenceNo)).toEqual([2, 1]);
    expect(input[0]).not.toHaveProperty("annotations");
  });
});
