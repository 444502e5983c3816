import type { DiameterRange, GradationAnalysis } from '@/types/gradation';
import { StatusBadge, gradationStatus } from '@/components/ui/StatusBadge';
import { DataDisplay } from '@/components/ui/DataDisplay';
import { Button } from '@/components/ui/button';
import {
  formatCoefficient,
  formatDiameter,
  buildRangeNotes,
  getInterpolationLabel,
} from '@/utils/gradationFormatting';
import { CheckCircle, AlertTriangle, FileDown } from 'lucide-react';
import { cn } from '@/lib/utils';

interface ResultsSummaryProps {
  analysis: GradationAnalysis;
  onExport?: () => void;
  className?: string;
}

export function ResultsSummary({ analysis, onExport, className }: ResultsSummaryProps) {
  const { diameters, metrics, classification } = analysis;
  const isWellGraded = classification.gradation === 'well-graded';
  const notes = buildRangeNotes(analysis);

  const clampNote = (range: DiameterRange) =>
    range === 'within' ? undefined : 'Outside the measured curve; clamped to the nearest sieve';

  return (
    <div className={cn("panel", className)}>
      <div className="panel-header">
        <span className="panel-title">Interpretation</span>
        {onExport && (
          <Button variant="outline" size="sm" onClick={onExport}>
            <FileDown className="w-4 h-4 mr-2" />
            Export Report
          </Button>
        )}
      </div>

      <div className="p-4">
        <div className={cn(
          "flex items-center justify-between p-3 rounded-lg mb-4",
          isWellGraded
            ? "bg-success/10 border border-success/30"
            : "bg-warning/10 border border-warning/30"
        )}>
          <div className="flex items-center gap-3">
            {isWellGraded ? (
              <CheckCircle className="w-6 h-6 text-success" />
            ) : (
              <AlertTriangle className="w-6 h-6 text-warning" />
            )}
            <div>
              <h3 className="text-base font-semibold">{classification.soilLabel}</h3>
              <p className="text-xs text-muted-foreground">{getInterpolationLabel(analysis)}</p>
            </div>
          </div>

          <StatusBadge status={gradationStatus(classification.gradation)} label={classification.gradationLabel} />
        </div>

        <div className="grid grid-cols-3 gap-3 mb-3">
          {[diameters.d10, diameters.d30, diameters.d60].map(d => (
            <div key={d.percent} className="p-3 rounded-lg bg-secondary/50 border border-border">
              <DataDisplay
                label={`D${d.percent}`}
                value={formatDiameter(d)}
                unit="mm"
                size="lg"
                note={clampNote(d.range)}
              />
            </div>
          ))}
        </div>

        <div className="grid grid-cols-2 gap-3">
          <div className="p-3 rounded-lg bg-secondary/50 border border-border">
            <DataDisplay label="Uniformity Coefficient (Cu)" value={formatCoefficient(metrics.cu)} />
          </div>
          <div className="p-3 rounded-lg bg-secondary/50 border border-border">
            <DataDisplay label="Coefficient of Curvature (Cc)" value={formatCoefficient(metrics.cc)} />
          </div>
        </div>

        {notes.length > 0 && (
          <ul className="mt-4 space-y-1 text-xs text-warning">
            {notes.map(note => (
              <li key={note}>{note}</li>
            ))}
          </ul>
        )}
      </div>
    </div>
  );
}
