// @vitest-environment jsdom
import { afterEach, describe, expect, it } from "vitest";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import WhatIfPanel from "./WhatIfPanel";
import type { AllocationTable } from "@/lib/allocationTable";

const lowLeadTable: AllocationTable = [
  { party: "Party 1", good: 71, neutral: 71, worst: 71 },
  { party: "Party 2", good: 163, neutral: 163, worst: 163 },
];

describe("WhatIfPanel", () => {
  afterEach(() => {
    cleanup();
  });

  it("previews nothing while the slider is untouched", () => {
    render(<WhatIfPanel table={lowLeadTable} scenario="good" />);

    expect(screen.queryByText(/Allies would/)).toBeNull();
    expect(screen.getByLabelText("What-if Party 1 seats")).toHaveProperty("value", "100");
  });

  it("previews the allies' loss once a target is picked", () => {
    render(<WhatIfPanel table={lowLeadTable} scenario="good" />);

    fireEvent.change(screen.getByLabelText("What-if Party 1 seats"), {
      target: { value: "110" },
    });

    expect(screen.getByText("Allies would lose 39 seats total")).toBeTruthy();
    expect(screen.getByText("Party 2: 163 → 124")).toBeTruthy();
  });
});
