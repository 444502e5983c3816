import type { GradationAnalysis } from '@/types/gradation';
import { TABLE_HEADERS, buildTableRows, formatWeight } from '@/utils/gradationFormatting';
import { cn } from '@/lib/utils';

interface GradationTableProps {
  analysis: GradationAnalysis;
  className?: string;
}

export function GradationTable({ analysis, className }: GradationTableProps) {
  const rows = buildTableRows(analysis);

  return (
    <div className={cn("panel", className)}>
      <div className="panel-header">
        <span className="panel-title">Sieve Analysis Table</span>
        <span className="text-xs text-muted-foreground font-mono">
          Total {formatWeight(analysis.totalWeight)} g
        </span>
      </div>

      <div className="p-4 overflow-x-auto">
        <table className="w-full text-sm">
          <thead>
            <tr className="bg-primary text-primary-foreground">
              {TABLE_HEADERS.map(header => (
                <th key={header} className="px-3 py-2 text-center text-xs font-semibold">
                  {header}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row, i) => (
              <tr
                key={`${row.sieveSize}-${i}`}
                className={cn(
                  "border-b border-border",
                  i % 2 === 1 && "bg-secondary/40",
                  analysis.table[i].isPan && "italic text-muted-foreground"
                )}
              >
                <td className="px-3 py-1.5 text-center font-mono">{row.sieveSize}</td>
                <td className="px-3 py-1.5 text-center font-mono">{row.weightRetained}</td>
                <td className="px-3 py-1.5 text-center font-mono">{row.percentRetained}</td>
                <td className="px-3 py-1.5 text-center font-mono">{row.cumulativePercentRetained}</td>
                <td className="px-3 py-1.5 text-center font-mono">{row.percentPassing}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
