import { cn } from "@/lib/utils";

interface DataDisplayProps {
  label: string;
  value: string;
  unit?: string;
  note?: string;
  size?: 'sm' | 'md' | 'lg';
  className?: string;
}

export function DataDisplay({ label, value, unit, note, size = 'md', className }: DataDisplayProps) {
  return (
    <div className={cn("flex flex-col gap-0.5", className)} title={note}>
      <span className="data-label">{label}</span>
      <div className="flex items-baseline gap-1">
        <span
          className={cn(
            "data-value font-mono",
            size === 'sm' && "text-sm",
            size === 'md' && "text-base",
            size === 'lg' && "text-xl font-semibold",
            note && "text-warning"
          )}
        >
          {value}
        </span>
        {unit && <span className="data-unit">{unit}</span>}
      </div>
    </div>
  );
}
