import type { EventMapping } from "../types/event";

interface EventLegendProps {
  mapping: EventMapping;
  /** 라벨 키별 run 개수 */
  counts?: ReadonlyMap<string, number>;
  hiddenLabels?: ReadonlySet<string>;
  /** 있으면 체크박스로 표시/숨김 토글 */
  onToggle?: (key: string) => void;
}

export function EventLegend({ mapping, counts, hiddenLabels, onToggle }: EventLegendProps) {
  const keys = Object.keys(mapping);
  if (keys.length === 0) return null;

  return (
    <div className="event-legend">
      {keys.map((key) => {
        const style = mapping[key];
        return (
          <label key={key} className="event-legend-item">
            {onToggle && (
              <input
                type="checkbox"
                checked={!hiddenLabels?.has(key)}
                onChange={() => onToggle(key)}
              />
            )}
            <span
              className="event-legend-swatch"
              style={{ display: "inline-block", width: 12, height: 12, background: style.color }}
            />
            <span>{style.label}</span>
            {counts && <span className="event-legend-count">{counts.get(key) ?? 0}</span>}
          </label>
        );
      })}
    </div>
  );
}
