import { describe, expect, it } from "vitest";
import { DESTINATION_IDS } from "../../config/limits";
import { destinations, getDestination, isDestinationId } from "../index";

describe("destination registry", () => {
  it("registers one provider per destination id, in write order", () => {
    expect(Array.from(destinations.keys())).toEqual([...DESTINATION_IDS]);
    for (const [id, provider] of destinations) {
      expect(provider.name).toBe(id);
    }
  });

  it("recognises destination ids", () => {
    expect(isDestinationId("prettier-ignore")).toBe(true);
    expect(isDestinationId("stylelint")).toBe(false);
  });

  it("throws DESTINATION_UNKNOWN for an unknown id", () => {
    expect(getDestination("editor-settings").name).toBe("editor-settings");
    expect(() => getDestination("stylelint")).toThrow("Unknown destination: stylelint");
  });
});
