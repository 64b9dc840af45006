import { useCallback, useMemo, useState } from "react";
import type { EventMapping } from "../types/event";
import type { GazeDetector } from "../types/detector";
import { ScarfPlot } from "./ScarfPlot";
import { EventLegend } from "./EventLegend";
import type { MatchingOptions } from "../utils/matching";
import { compareDetectors, countBandsByLabel, type DetectorComparison } from "../utils/comparison";

const PLOT_ROW_PX = 36;

interface DetectorComparisonViewProps {
  time: readonly number[];
  x: readonly number[];
  y: readonly number[];
  detectors: readonly GazeDetector[];
  mapping: EventMapping;
  width?: number;
  /** 일치도 기준 검출기 이름 (기본: 첫 검출기) */
  referenceName?: string;
  /** run 짝짓기 조건 (기본: DEFAULT_MATCHING) */
  matching?: MatchingOptions;
}

type ComparisonState =
  | { ok: true; comparison: DetectorComparison }
  | { ok: false; error: string };

function formatScore(v: number): string {
  return Number.isFinite(v) ? v.toFixed(3) : "–";
}

export function DetectorComparisonView({
  time,
  x,
  y,
  detectors,
  mapping,
  width,
  referenceName,
  matching,
}: DetectorComparisonViewProps) {
  const [hiddenLabels, setHiddenLabels] = useState<Set<string>>(new Set());

  const state = useMemo<ComparisonState>(() => {
    try {
      return { ok: true, comparison: compareDetectors(detectors, time, x, y, mapping, referenceName, matching) };
    } catch (err) {
      console.error("scarfplot 생성 실패:", err);
      return { ok: false, error: err instanceof Error ? err.message : "scarfplot 생성 실패" };
    }
  }, [detectors, time, x, y, mapping, referenceName, matching]);

  const toggleLabel = useCallback((key: string) => {
    setHiddenLabels((prev) => {
      const next = new Set(prev);
      if (next.has(key)) next.delete(key);
      else next.add(key);
      return next;
    });
  }, []);

  if (!state.ok) {
    return (
      <div className="detector-comparison">
        <div className="detector-comparison-error">{state.error}</div>
      </div>
    );
  }

  const { comparison } = state;
  return (
    <div className="detector-comparison">
      <ScarfPlot
        figure={comparison.figure}
        width={width}
        height={Math.max(1, comparison.results.length) * PLOT_ROW_PX}
        hiddenLabels={hiddenLabels}
        title={`검출기 ${comparison.results.length}개`}
      />
      <EventLegend
        mapping={mapping}
        counts={countBandsByLabel(comparison.figure)}
        hiddenLabels={hiddenLabels}
        onToggle={toggleLabel}
      />
      {comparison.agreement.length > 0 && (
        <table className="detector-agreement">
          <caption>기준: {comparison.reference}</caption>
          <thead>
            <tr>
              <th>검출기</th>
              <th>Balanced Acc.</th>
              <th>Kappa</th>
              <th>MCC</th>
              <th>Match</th>
            </tr>
          </thead>
          <tbody>
            {comparison.agreement.map((row) => (
              <tr key={row.detector}>
                <td>{row.detector}</td>
                <td>{formatScore(row.accuracy)}</td>
                <td>{formatScore(row.kappa)}</td>
                <td>{formatScore(row.mcc)}</td>
                <td>{formatScore(row.matchRatio)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}
