import { forwardRef, useMemo } from 'react';
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ReferenceLine,
  type TooltipProps,
} from 'recharts';
import type { GradationAnalysis } from '@/types/gradation';
import {
  buildChartPoints,
  getChartTicks,
  formatPercent,
  formatSieveSize,
  type ChartPoint,
} from '@/utils/gradationFormatting';
import { ChartContainer } from '@/components/charts/ChartContainer';
import { cn } from '@/lib/utils';

interface PassingCurveChartProps {
  analysis: GradationAnalysis;
  className?: string;
}

const CHART_HEIGHT = 320;

function CurveTooltip({ active, payload }: TooltipProps<number, string>) {
  if (!active || !payload || payload.length === 0) return null;
  const point: ChartPoint = payload[0].payload;

  return (
    <div className="bg-card border border-border rounded-lg p-3 shadow-lg min-w-[160px]">
      <p className="text-sm font-medium mb-1">{formatSieveSize(point.size)} mm</p>
      <div className="flex items-center justify-between gap-4 text-sm">
        <span className="text-muted-foreground">Passing</span>
        <span className="font-mono">{formatPercent(point.passing)} %</span>
      </div>
    </div>
  );
}

/**
 * Semi-log particle size distribution curve. The wrapping element is exposed
 * through the ref so the workspace can capture it for the report.
 */
export const PassingCurveChart = forwardRef<HTMLDivElement, PassingCurveChartProps>(
  ({ analysis, className }, ref) => {
    const points = useMemo(() => buildChartPoints(analysis), [analysis]);
    const ticks = useMemo(() => getChartTicks(analysis.sieveSpec), [analysis.sieveSpec]);
    const markers = [analysis.diameters.d10, analysis.diameters.d30, analysis.diameters.d60]
      .filter(d => d.range === 'within');

    return (
      <div ref={ref} className={cn("panel", className)}>
        <div className="panel-header">
          <span className="panel-title">Particle Size Distribution Curve</span>
          <span className="text-xs text-muted-foreground">Sieve size (mm), log scale</span>
        </div>

        <div className="p-4">
          <ChartContainer height={CHART_HEIGHT}>
            {({ width, height }) => (
              <LineChart
                data={points}
                width={width}
                height={height}
                margin={{ top: 20, right: 30, left: 10, bottom: 20 }}
              >
                <CartesianGrid strokeDasharray="3 3" stroke="hsl(var(--border))" />
                <XAxis
                  dataKey="size"
                  type="number"
                  scale="log"
                  domain={[ticks[0], ticks[ticks.length - 1]]}
                  ticks={ticks}
                  tickFormatter={(size: number) => `${size}`}
                  allowDataOverflow
                  stroke="hsl(var(--muted-foreground))"
                  tick={{ fontSize: 11 }}
                  label={{ value: 'Sieve Size (mm)', position: 'insideBottom', offset: -10, fill: 'hsl(var(--muted-foreground))', fontSize: 10 }}
                />
                <YAxis
                  type="number"
                  domain={[0, 100]}
                  ticks={[0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100]}
                  stroke="hsl(var(--muted-foreground))"
                  tick={{ fontSize: 11 }}
                  label={{ value: 'Cumulative % Passing', angle: -90, position: 'insideLeft', fill: 'hsl(var(--muted-foreground))', fontSize: 10 }}
                />
                <Tooltip content={<CurveTooltip />} />

                {markers.map(d => (
                  <ReferenceLine
                    key={d.percent}
                    x={d.value}
                    stroke="hsl(var(--warning))"
                    strokeDasharray="5 5"
                    label={{ value: `D${d.percent}`, position: 'top', fill: 'hsl(var(--warning))', fontSize: 10 }}
                  />
                ))}

                <Line
                  type="linear"
                  dataKey="passing"
                  name="% Passing"
                  stroke="hsl(var(--chart-1))"
                  strokeWidth={2}
                  dot={{ fill: 'hsl(var(--chart-1))', r: 4 }}
                  isAnimationActive={false}
                />
              </LineChart>
            )}
          </ChartContainer>
        </div>
      </div>
    );
  }
);
PassingCurveChart.displayName = 'PassingCurveChart';
