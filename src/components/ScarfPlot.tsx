import { useEffect, useState } from "react";
import type { Figure } from "../types/figure";
import { DEFAULT_PLOT_HEIGHT, LEGEND_WIDTH, MIN_BAND_PX } from "../config";
import { figureTimeRange, figureYRange } from "../utils/figure";

const HIDDEN_OPACITY = 0.15;

interface ScarfPlotProps {
  figure: Figure;
  /** 고정 폭(px). 없으면 ResizeObserver로 측정 */
  width?: number;
  height?: number;
  /** 흐리게 표시할 라벨 키 */
  hiddenLabels?: ReadonlySet<string>;
  title?: string;
}

export function ScarfPlot({
  figure,
  width: fixedWidth,
  height = DEFAULT_PLOT_HEIGHT,
  hiddenLabels,
  title,
}: ScarfPlotProps) {
  // callback ref: 빈 상태에서 band가 생겨 wrapper가 새로 붙어도 다시 관찰
  const [wrapEl, setWrapEl] = useState<HTMLDivElement | null>(null);
  const [measuredWidth, setMeasuredWidth] = useState(0);

  useEffect(() => {
    if (fixedWidth !== undefined || !wrapEl) return;
    const ro = new ResizeObserver((entries) => {
      setMeasuredWidth(entries[0]?.contentRect?.width ?? 0);
    });
    ro.observe(wrapEl);
    return () => ro.disconnect();
  }, [fixedWidth, wrapEl]);

  const width = fixedWidth ?? measuredWidth;
  const timeRange = figureTimeRange(figure);
  const yRange = figureYRange(figure);

  if (!timeRange || !yRange) {
    return (
      <div className="scarf-plot">
        {title && <div className="scarf-plot-title">{title}</div>}
        <div className="scarf-plot-empty">표시할 이벤트 없음</div>
      </div>
    );
  }

  const [tStart, tEnd] = timeRange;
  const [yLo, yHi] = yRange;
  const timeSpan = Math.max(0.001, tEnd - tStart);
  const ySpan = yHi - yLo;
  const xScale = (t: number) => (width > 0 ? ((t - tStart) / timeSpan) * width : 0);
  // y가 클수록 위쪽
  const yScale = (v: number) => ((yHi - v) / ySpan) * height;
  const xSpan = (x0: number, x1: number) => {
    const a = xScale(x0);
    const b = xScale(x1);
    return { x: Math.min(a, b), w: Math.max(MIN_BAND_PX, Math.abs(b - a)) };
  };

  return (
    <div className="scarf-plot">
      {title && <div className="scarf-plot-title">{title}</div>}
      <div className="scarf-plot-body" style={{ display: "flex" }}>
        <div className="scarf-plot-rows" style={{ position: "relative", width: LEGEND_WIDTH, height }}>
          {figure.rows.map((row, i) => (
            <span
              key={`${row.name}-${i}`}
              className="scarf-plot-row-name"
              style={{ position: "absolute", top: yScale(row.y), transform: "translateY(-50%)" }}
            >
              {row.name}
            </span>
          ))}
        </div>
        <div className="scarf-plot-svg-wrap" ref={setWrapEl} style={{ height, flex: 1 }}>
          <svg width={width} height={height} style={{ display: "block" }}>
            {figure.bands.map((band, i) => {
              const { x, w } = xSpan(band.xStart, band.xEnd);
              const y = yScale(band.yMax);
              return (
                <rect
                  key={i}
                  x={x}
                  y={y}
                  width={w}
                  height={yScale(band.yMin) - y}
                  fill={band.color}
                  fillOpacity={hiddenLabels?.has(band.label) ? HIDDEN_OPACITY : 1}
                  stroke="none"
                  data-label={band.label}
                />
              );
            })}
          </svg>
        </div>
      </div>
      <div className="scarf-plot-axis">
        <span>{tStart.toFixed(0)} ms</span>
        <span>{tEnd.toFixed(0)} ms</span>
      </div>
    </div>
  );
}
