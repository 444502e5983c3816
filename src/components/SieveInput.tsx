import type { FormEvent } from 'react';
import type { GradationError, InterpolationMethod, SieveSpec } from '@/types/gradation';
import { expectedWeightCount } from '@/utils/sieveInput';
import { formatSieveSize } from '@/utils/gradationFormatting';
import { Button } from '@/components/ui/button';
import { Play, AlertCircle } from 'lucide-react';
import { cn } from '@/lib/utils';

interface SieveInputProps {
  sieveSets: readonly SieveSpec[];
  sieveSpec: SieveSpec;
  onSieveSetChange: (id: string) => void;
  includePan: boolean;
  onIncludePanChange: (includePan: boolean) => void;
  interpolation: InterpolationMethod;
  onInterpolationChange: (method: InterpolationMethod) => void;
  value: string;
  onChange: (value: string) => void;
  onSubmit: () => void;
  error: GradationError | null;
  className?: string;
}

export function SieveInput({
  sieveSets,
  sieveSpec,
  onSieveSetChange,
  includePan,
  onIncludePanChange,
  interpolation,
  onInterpolationChange,
  value,
  onChange,
  onSubmit,
  error,
  className,
}: SieveInputProps) {
  const expected = expectedWeightCount(sieveSpec, includePan);
  const sizes = includePan ? sieveSpec.sizes : sieveSpec.sizes.filter(s => s > 0);

  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    onSubmit();
  };

  return (
    <form className={cn("panel", className)} onSubmit={handleSubmit}>
      <div className="panel-header">
        <span className="panel-title">Weight Retained</span>
        <span className="text-xs text-muted-foreground">{expected} values, coarsest first</span>
      </div>

      <div className="p-4 space-y-4">
        <div className="grid grid-cols-2 gap-3">
          <label className="flex flex-col gap-1 text-xs">
            <span className="data-label">Sieve set</span>
            <select
              className="h-9 rounded-md border border-input bg-card px-2 text-sm"
              value={sieveSpec.id}
              onChange={(e) => onSieveSetChange(e.target.value)}
            >
              {sieveSets.map(set => (
                <option key={set.id} value={set.id}>{set.name}</option>
              ))}
            </select>
          </label>

          <label className="flex flex-col gap-1 text-xs">
            <span className="data-label">Interpolation</span>
            <select
              className="h-9 rounded-md border border-input bg-card px-2 text-sm"
              value={interpolation}
              onChange={(e) => onInterpolationChange(e.target.value === 'log-linear' ? 'log-linear' : 'linear')}
            >
              <option value="linear">Linear</option>
              <option value="log-linear">Log-linear (semi-log)</option>
            </select>
          </label>
        </div>

        <label className="flex items-center gap-2 text-sm cursor-pointer">
          <input
            type="checkbox"
            checked={includePan}
            onChange={(e) => onIncludePanChange(e.target.checked)}
          />
          Include pan weight in the list
        </label>

        <div className="flex flex-wrap gap-1.5">
          {sizes.map(size => (
            <span key={size} className="px-2 py-0.5 rounded bg-muted/40 border border-border text-xs font-mono">
              {formatSieveSize(size)}
            </span>
          ))}
        </div>

        <label className="flex flex-col gap-1">
          <span className="data-label">Weight retained in grams (comma-separated)</span>
          <input
            type="text"
            className={cn(
              "h-9 rounded-md border bg-card px-3 font-mono text-sm",
              error ? "border-destructive" : "border-input"
            )}
            placeholder="e.g. 0, 50, 100, 150, 150, 100, 50, 0"
            value={value}
            onChange={(e) => onChange(e.target.value)}
            aria-invalid={error !== null}
          />
        </label>

        {error && (
          <div className="flex items-start gap-2 rounded-md border border-destructive/30 bg-destructive/10 p-2 text-xs text-destructive">
            <AlertCircle className="w-4 h-4 shrink-0" />
            <span>{error.message}</span>
          </div>
        )}

        <Button type="submit" className="w-full">
          <Play className="w-4 h-4 mr-2" />
          Run Analysis
        </Button>
      </div>
    </form>
  );
}
