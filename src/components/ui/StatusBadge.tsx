import { cn } from "@/lib/utils";
import type { GradationType } from "@/types/gradation";

export type BadgeStatus = 'pass' | 'warning';

interface StatusBadgeProps {
  status: BadgeStatus;
  label: string;
  className?: string;
}

export function gradationStatus(gradation: GradationType): BadgeStatus {
  return gradation === 'well-graded' ? 'pass' : 'warning';
}

export function StatusBadge({ status, label, className }: StatusBadgeProps) {
  return (
    <span
      className={cn(
        "inline-flex items-center gap-1.5 px-3 py-1.5 rounded-full text-xs font-semibold uppercase tracking-wider",
        status === 'pass' && "status-pass",
        status === 'warning' && "status-warning",
        className
      )}
    >
      {label}
    </span>
  );
}
