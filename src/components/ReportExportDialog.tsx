import { useState } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import type { SampleDetails } from '@/types/gradation';
import { Button } from '@/components/ui/button';
import { FileDown, FileType, X } from 'lucide-react';
import { cn } from '@/lib/utils';

export type ReportFormat = 'pdf' | 'word';

interface ReportExportDialogProps {
  open: boolean;
  onOpenChange: (open: boolean) => void;
  initialDetails: SampleDetails;
  onExport: (format: ReportFormat, details: SampleDetails) => void;
}

const detailFields: { key: keyof SampleDetails; label: string; placeholder: string }[] = [
  { key: 'projectName', label: 'Project', placeholder: 'Site investigation' },
  { key: 'sampleId', label: 'Sample ID', placeholder: 'BH1-S2' },
  { key: 'location', label: 'Location / depth', placeholder: 'Borehole 1, 1.5 m' },
  { key: 'testedBy', label: 'Tested by', placeholder: 'Lab technician' },
];

export function ReportExportDialog({ open, onOpenChange, initialDetails, onExport }: ReportExportDialogProps) {
  const [format, setFormat] = useState<ReportFormat>('pdf');
  const [details, setDetails] = useState<SampleDetails>(initialDetails);

  const handleExport = () => {
    onExport(format, details);
    onOpenChange(false);
  };

  return (
    <AnimatePresence>
      {open && (
        <motion.div
          className="fixed inset-0 z-50 flex items-center justify-center bg-black/40"
          initial={{ opacity: 0 }}
          animate={{ opacity: 1 }}
          exit={{ opacity: 0 }}
          onClick={() => onOpenChange(false)}
        >
          <motion.div
            role="dialog"
            aria-modal="true"
            aria-labelledby="report-export-title"
            className="w-full max-w-md rounded-lg border border-border bg-card p-5 shadow-xl"
            initial={{ scale: 0.96, y: 8 }}
            animate={{ scale: 1, y: 0 }}
            exit={{ scale: 0.96, y: 8 }}
            transition={{ duration: 0.15 }}
            onClick={(e) => e.stopPropagation()}
          >
            <div className="flex items-center justify-between mb-4">
              <h2 id="report-export-title" className="text-base font-semibold">Export Report</h2>
              <Button variant="ghost" size="icon" className="h-8 w-8" onClick={() => onOpenChange(false)}>
                <X className="w-4 h-4" />
              </Button>
            </div>

            <div className="grid grid-cols-2 gap-2 mb-4">
              {(['pdf', 'word'] as const).map(f => (
                <button
                  key={f}
                  type="button"
                  onClick={() => setFormat(f)}
                  className={cn(
                    "flex items-center justify-center gap-2 rounded-md border px-3 py-2 text-sm",
                    format === f ? "border-primary bg-primary/10 text-primary" : "border-border"
                  )}
                >
                  {f === 'pdf' ? <FileDown className="w-4 h-4" /> : <FileType className="w-4 h-4" />}
                  {f === 'pdf' ? 'PDF' : 'Word'}
                </button>
              ))}
            </div>

            <div className="space-y-3">
              {detailFields.map(field => (
                <label key={field.key} className="flex flex-col gap-1">
                  <span className="data-label">{field.label}</span>
                  <input
                    type="text"
                    className="h-9 rounded-md border border-input bg-card px-3 text-sm"
                    placeholder={field.placeholder}
                    value={details[field.key] ?? ''}
                    onChange={(e) => setDetails(prev => ({ ...prev, [field.key]: e.target.value }))}
                  />
                </label>
              ))}
            </div>

            <div className="mt-5 flex justify-end gap-2">
              <Button variant="outline" onClick={() => onOpenChange(false)}>
                Cancel
              </Button>
              <Button onClick={handleExport}>
                {format === 'pdf' ? (
                  <FileDown className="w-4 h-4 mr-2" />
                ) : (
                  <FileType className="w-4 h-4 mr-2" />
                )}
                Export {format === 'pdf' ? 'PDF' : 'Word'}
              </Button>
            </div>
          </motion.div>
        </motion.div>
      )}
    </AnimatePresence>
  );
}
