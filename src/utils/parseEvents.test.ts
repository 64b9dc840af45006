import { describe, expect, it } from "vitest";
import { parseDetectionsJson, parseEventLabel, parseEventMappingJson } from "./parseEvents";
import { resolveColor } from "./colors";

describe("parseEventLabel", () => {
  it("maps numeric codes to event labels", () => {
    expect(parseEventLabel(0)).toBe("undefined");
    expect(parseEventLabel(2)).toBe("saccade");
    expect(parseEventLabel(4)).toBe("smooth_pursuit");
  });

  it("accepts names and aliases case-insensitively", () => {
    expect(parseEventLabel(" FIXATION ")).toBe("fixation");
    expect(parseEventLabel("Smooth Pursuit")).toBe("smooth_pursuit");
    expect(parseEventLabel("sp")).toBe("smooth_pursuit");
  });

  it("treats empty values as missing", () => {
    expect(parseEventLabel(null)).toBeNull();
    expect(parseEventLabel(undefined)).toBeNull();
    expect(parseEventLabel(NaN)).toBeNull();
    expect(parseEventLabel("")).toBeNull();
  });

  it("keeps unknown values as strings", () => {
    expect(parseEventLabel(9)).toBe("9");
    expect(parseEventLabel(1.5)).toBe("1.5");
    expect(parseEventLabel("Z")).toBe("Z");
  });
});

describe("parseDetectionsJson", () => {
  it("reads detectors keyed by name", () => {
    const data = {
      time: [0, 4, 8],
      detectors: { IVT: [1, 1, 2], Engbert: ["fixation", "saccade", null] },
    };
    expect(parseDetectionsJson(data)).toEqual({
      source: "",
      time: [0, 4, 8],
      detectors: [
        { detector: "IVT", labels: ["fixation", "fixation", "saccade"] },
        { detector: "Engbert", labels: ["fixation", "saccade", "undefined"] },
      ],
    });
  });

  it("reads a list of detectors", () => {
    const data = {
      source: "trial_01",
      time: [0, 2],
      detectors: [{ name: "NH", labels: [5, 5] }],
    };
    expect(parseDetectionsJson(data)).toEqual({
      source: "trial_01",
      time: [0, 2],
      detectors: [{ detector: "NH", labels: ["blink", "blink"] }],
    });
  });

  it("returns null for unrecognized input", () => {
    expect(parseDetectionsJson(null)).toBeNull();
    expect(parseDetectionsJson([1, 2])).toBeNull();
    expect(parseDetectionsJson({ detectors: { IVT: [1] } })).toBeNull();
    expect(parseDetectionsJson({ time: [0, 1], detectors: {} })).toBeNull();
  });

  it("returns null when a row does not match the time axis", () => {
    expect(parseDetectionsJson({ time: [0, 1], detectors: { IVT: [1] } })).toBeNull();
  });

  it("returns null for unknown labels", () => {
    expect(parseDetectionsJson({ time: [0, 1], detectors: { IVT: [1, "Z"] } })).toBeNull();
  });
});

describe("parseEventMappingJson", () => {
  it("reads colors keyed by name or numeric code", () => {
    const mapping = parseEventMappingJson({
      "1": "#111111",
      saccade: { color: "#222222", label: "Sac" },
    });
    expect(mapping).toEqual({
      fixation: { label: "fixation", color: "#111111" },
      saccade: { label: "Sac", color: "#222222" },
    });
    expect(mapping && Object.isFrozen(mapping)).toBe(true);
  });

  it("returns null for invalid entries", () => {
    expect(parseEventMappingJson({ fixation: 3 })).toBeNull();
    expect(parseEventMappingJson({ fixation: { label: "F" } })).toBeNull();
    expect(parseEventMappingJson({})).toBeNull();
    expect(parseEventMappingJson("fixation")).toBeNull();
  });

  it("keeps a __proto__ key as an ordinary entry", () => {
    expect(parseEventLabel("__proto__")).toBe("__proto__");
    const mapping = parseEventMappingJson(JSON.parse('{"__proto__": "#000000", "fixation": "#111111"}'));
    expect(mapping).not.toBeNull();
    if (!mapping) return;
    expect(Object.getPrototypeOf(mapping)).toBe(Object.prototype);
    expect(Object.keys(mapping)).toEqual(["__proto__", "fixation"]);
    expect(resolveColor(mapping, "__proto__")).toBe("#000000");
    expect(resolveColor(mapping, "fixation")).toBe("#111111");
  });
});
