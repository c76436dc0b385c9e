import { describe, it, expect } from "vitest";

import { describeCode, lookupLabel, parseLabelTables } from "../src/index.js";

describe("code labels", () => {
  it("resolves codes from the bundled tables", () => {
    expect(describeCode("equipment", 0x16)).toBe("Automatic ticket gate");
    expect(describeCode("transactionType", 0x46)).toBe("Purchase");
    expect(describeCode("gateInOut", 0x20)).toBe("Exit");
    expect(lookupLabel("cardType", 0x03)).toBe("ICOCA");
  });

  it("falls back to the raw code", () => {
    expect(lookupLabel("equipment", 0xee)).toBeUndefined();
    expect(describeCode("equipment", 0xee)).toBe("Unknown equipment (0xEE)");
  });

  it("validates label data", () => {
    expect(() => parseLabelTables([])).toThrow("Code label data must be an object");
    expect(() => parseLabelTables({})).toThrow("Code label table missing: equipment");
    expect(() =>
      parseLabelTables({ equipment: { "0x01": 5 } }),
    ).toThrow("Label for equipment 0x01 is not a string");
  });
});
