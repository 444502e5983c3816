import { useRef, useState, useEffect, type ReactElement } from 'react';

interface ChartSize {
  width: number;
  height: number;
}

interface ChartContainerProps {
  children: (size: ChartSize) => ReactElement;
  height?: number;
  className?: string;
}

/**
 * Measures its own width and hands explicit dimensions to the chart,
 * avoiding ResponsiveContainer issues on some desktop browsers.
 */
export function ChartContainer({ children, height = 320, className }: ChartContainerProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const [width, setWidth] = useState(0);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const measure = () => {
      const rect = container.getBoundingClientRect();
      if (rect.width > 50) {
        setWidth(Math.floor(rect.width));
      }
    };

    // Wait for layout before the first measurement
    const timeoutId = setTimeout(measure, 50);

    const resizeObserver = new ResizeObserver((entries) => {
      for (const entry of entries) {
        if (entry.contentRect.width > 50) {
          setWidth(Math.floor(entry.contentRect.width));
        }
      }
    });
    resizeObserver.observe(container);

    return () => {
      clearTimeout(timeoutId);
      resizeObserver.disconnect();
    };
  }, []);

  return (
    <div
      ref={containerRef}
      className={className}
      style={{ width: '100%', height, minWidth: 300, position: 'relative' }}
    >
      {width > 0 ? (
        children({ width, height })
      ) : (
        <div className="flex items-center justify-center h-full">
          <span className="text-muted-foreground text-sm">Loading chart...</span>
        </div>
      )}
    </div>
  );
}
