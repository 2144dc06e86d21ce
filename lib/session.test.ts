import { describe, expect, it } from "vitest";
import { defaultTable, isBalanced } from "./allocationTable";
import { applyCommand, commandFromUpload, createSession } from "./session";

const encode = (text: string) => {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

describe("session", () => {
  it("starts from the default table in the requested scenario", () => {
    const session = createSession("worst");
    expect(session.scenario).toBe("worst");
    expect(session.current).toEqual(defaultTable());
    expect(session.status).toEqual({ kind: "idle" });
  });

  it("rebalances an edit in the active scenario", () => {
    const session = applyCommand(createSession(), { type: "editCell", row: 0, value: 178 });
    expect(session.current[0]).toEqual({ party: "Party 1", good: 171, neutral: 163, worst: 158 });
    expect(session.current[8].good).toBe(19);
    expect(session.original).toEqual(defaultTable());
  });

  it("edits the column of the selected scenario", () => {
    const neutral = applyCommand(createSession(), { type: "selectScenario", scenario: "neutral" });
    const session = applyCommand(neutral, { type: "editCell", row: 8, value: 30 });
    expect(session.current[8]).toEqual({ party: "Party 9", good: 22, neutral: 30, worst: 25 });
    expect(session.current[0].neutral).toBe(157);
  });

  it("ignores edits that keep the same value", () => {
    const session = createSession();
    expect(applyCommand(session, { type: "editCell", row: 8, value: 22 })).toBe(session);
  });

  it("reports strict-mode rejections without touching the table", () => {
    const session = createSession();
    const next = applyCommand(
      session,
      { type: "editCell", row: 8, value: 300 },
      { strict: true }
    );
    expect(next.current).toBe(session.current);
    expect(next.status).toEqual({
      kind: "error",
      message: "Seat counts must be whole numbers between 0 and 234.",
    });
  });

  it("resets to the original table", () => {
    const edited = applyCommand(createSession(), { type: "editCell", row: 8, value: 0 });
    const reset = applyCommand(edited, { type: "reset" });
    expect(reset.current).toEqual(defaultTable());
    expect(isBalanced(reset.current)).toBe(true);
  });

  it("loads an accepted upload", () => {
    const csv = "Party,Good,Neutral,Worst\nParty 2,34,44,54\nParty 1,200,190,180\n";
    const command = commandFromUpload("custom.csv", encode(csv));
    const session = applyCommand(createSession(), command);

    expect(session.current).toEqual([
      { party: "Party 1", good: 200, neutral: 190, worst: 180 },
      { party: "Party 2", good: 34, neutral: 44, worst: 54 },
    ]);
    expect(session.status).toEqual({ kind: "success", message: "Loaded custom.csv." });
  });

  it("keeps the current table when an upload lacks a Worst column", () => {
    const edited = applyCommand(createSession(), { type: "editCell", row: 8, value: 0 });
    const command = commandFromUpload("broken.csv", encode("Party,Good,Neutral\nParty 1,234,234\n"));
    const session = applyCommand(edited, command);

    expect(command).toEqual({ type: "reportError", message: "Missing required columns: Worst." });
    expect(session.current).toBe(edited.current);
    expect(session.status).toEqual({ kind: "error", message: "Missing required columns: Worst." });
  });

  it("clears the status on request", () => {
    const failed = applyCommand(createSession(), { type: "reportError", message: "Export failed" });
    expect(applyCommand(failed, { type: "dismissStatus" }).status).toEqual({ kind: "idle" });
  });
});
