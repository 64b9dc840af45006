import { afterEach, describe, expect, it, vi } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import { DetectorComparisonView } from "./DetectorComparisonView";
import { createPrecomputedDetector } from "../detectors";
import { DEFAULT_EVENT_MAPPING } from "../config";

const time = [0, 10, 20, 30];
const zeros = [0, 0, 0, 0];
const detectors = [
  createPrecomputedDetector("GT", ["fixation", "fixation", "saccade", "saccade"]),
  createPrecomputedDetector("IVT", ["fixation", "saccade", "saccade", "saccade"]),
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe("DetectorComparisonView", () => {
  it("stacks a row per detector and shows agreement with the reference", () => {
    const markup = renderToStaticMarkup(
      <DetectorComparisonView
        time={time}
        x={zeros}
        y={zeros}
        detectors={detectors}
        mapping={DEFAULT_EVENT_MAPPING}
        width={300}
      />
    );
    expect(markup.match(/<rect /g)).toHaveLength(4);
    expect(markup).toContain("<td>IVT</td><td>0.750</td><td>0.500</td><td>0.577</td><td>1.000</td>");
  });

  it("scores accuracy per reference label", () => {
    const markup = renderToStaticMarkup(
      <DetectorComparisonView
        time={time}
        x={zeros}
        y={zeros}
        detectors={[
          createPrecomputedDetector("GT", ["fixation", "fixation", "fixation", "saccade"]),
          createPrecomputedDetector("IVT", ["fixation", "fixation", "fixation", "fixation"]),
        ]}
        mapping={DEFAULT_EVENT_MAPPING}
        width={300}
      />
    );
    expect(markup).toContain("<th>Balanced Acc.</th>");
    expect(markup).toContain("<td>IVT</td><td>0.500</td>");
  });

  it("logs and shows the error instead of a partial plot", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const markup = renderToStaticMarkup(
      <DetectorComparisonView
        time={[0, 10, 20]}
        x={[0, 0, 0]}
        y={[0, 0, 0]}
        detectors={detectors}
        mapping={DEFAULT_EVENT_MAPPING}
        width={300}
      />
    );
    expect(markup).not.toContain("<rect");
    expect(markup).toContain("GT: precomputed labels cover 4 samples, time has 3");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
