import { useState, useRef } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import html2canvas from 'html2canvas';
import { toast } from 'sonner';
import type { SampleDetails } from '@/types/gradation';
import { SIEVE_SETS, getSieveSet } from '@/data/sieveSets';
import { analyzeSieveInput } from '@/utils/gradationCalculations';
import { useSieveWorkspace } from '@/hooks/useSieveWorkspace';
import { exportGradationPDF } from '@/utils/gradationPdfExport';
import { exportGradationWord } from '@/utils/gradationWordExport';
import { SieveInput } from '@/components/SieveInput';
import { GradationTable } from '@/components/GradationTable';
import { ResultsSummary } from '@/components/ResultsSummary';
import { PassingCurveChart } from '@/components/charts/PassingCurveChart';
import { ReportExportDialog, type ReportFormat } from '@/components/ReportExportDialog';
import { Button } from '@/components/ui/button';
import { FlaskConical, Menu, X } from 'lucide-react';

export default function SieveWorkspace() {
  const [state, dispatch] = useSieveWorkspace();
  const { sieveSpec, includePan, interpolation, input, analysis, error } = state;
  const [sidebarOpen, setSidebarOpen] = useState(true);
  const [showExportDialog, setShowExportDialog] = useState(false);
  const [sampleDetails, setSampleDetails] = useState<SampleDetails>({});
  const chartRef = useRef<HTMLDivElement>(null);

  const runAnalysis = () => {
    const outcome = analyzeSieveInput(input, sieveSpec, { includePan, interpolation });
    dispatch({ type: 'analysisFinished', outcome });

    if (!outcome.ok) {
      console.warn(`[Gradation] ${outcome.error.kind}: ${outcome.error.message}`);
      toast.error(outcome.error.message);
      return;
    }

    const { classification } = outcome.analysis;
    console.info(`[Gradation] ${sieveSpec.id}: ${classification.soilLabel}, ${classification.gradationLabel}`);
  };

  const captureChart = async (): Promise<string | undefined> => {
    if (!chartRef.current) return undefined;
    try {
      const canvas = await html2canvas(chartRef.current, {
        scale: 2,
        backgroundColor: '#ffffff',
      });
      return canvas.toDataURL('image/png');
    } catch (e) {
      console.error('[Report] Failed to capture passing curve', e);
      return undefined;
    }
  };

  const handleExport = async (format: ReportFormat, details: SampleDetails) => {
    if (!analysis) return;
    setSampleDetails(details);

    const chartImage = await captureChart();
    if (!chartImage && format === 'word') {
      toast.warning('Chart could not be captured; the Word report notes it as unavailable');
    }
    try {
      const filename = format === 'pdf'
        ? exportGradationPDF({ analysis, sample: details, chartImage })
        : exportGradationWord({ analysis, sample: details, chartImage });
      toast.success(`Report saved as ${filename}`);
    } catch (e) {
      console.error('[Report] Export failed', e);
      toast.error('Report export failed');
    }
  };

  return (
    <div className="h-screen flex flex-col bg-background overflow-hidden">
      <header className="h-12 border-b border-border bg-card flex items-center px-4 gap-3 shrink-0 z-10">
        <div className="flex items-center gap-2">
          <FlaskConical className="w-4 h-4 text-primary" />
          <span className="font-semibold text-sm">Sieve Analysis</span>
          <span className="text-xs text-muted-foreground">Particle size distribution</span>
        </div>
        <div className="flex-1" />
        <Button
          variant="ghost"
          size="icon"
          className="h-8 w-8"
          onClick={() => setSidebarOpen(!sidebarOpen)}
          title="Toggle input panel"
        >
          {sidebarOpen ? <X className="w-4 h-4" /> : <Menu className="w-4 h-4" />}
        </Button>
      </header>

      <div className="flex flex-1 overflow-hidden">
        <AnimatePresence initial={false}>
          {sidebarOpen && (
            <motion.aside
              initial={{ width: 0, opacity: 0 }}
              animate={{ width: 400, opacity: 1 }}
              exit={{ width: 0, opacity: 0 }}
              transition={{ duration: 0.25 }}
              className="shrink-0 overflow-hidden border-r border-border bg-card flex flex-col"
            >
              <div className="flex-1 overflow-auto p-4">
                <SieveInput
                  sieveSets={SIEVE_SETS}
                  sieveSpec={sieveSpec}
                  onSieveSetChange={(id) => dispatch({ type: 'setSieveSpec', sieveSpec: getSieveSet(id) })}
                  includePan={includePan}
                  onIncludePanChange={(value) => dispatch({ type: 'setIncludePan', includePan: value })}
                  interpolation={interpolation}
                  onInterpolationChange={(method) => dispatch({ type: 'setInterpolation', interpolation: method })}
                  value={input}
                  onChange={(value) => dispatch({ type: 'setInput', input: value })}
                  onSubmit={runAnalysis}
                  error={error}
                />
              </div>
            </motion.aside>
          )}
        </AnimatePresence>

        <main className="flex-1 overflow-auto p-4 bg-background">
          {analysis ? (
            <div className="flex flex-col gap-4 max-w-5xl mx-auto">
              <ResultsSummary analysis={analysis} onExport={() => setShowExportDialog(true)} />
              <GradationTable analysis={analysis} />
              <PassingCurveChart ref={chartRef} analysis={analysis} />
            </div>
          ) : (
            <div className="h-full flex items-center justify-center">
              <div className="text-center max-w-md">
                <div className="w-16 h-16 rounded-2xl bg-primary/10 flex items-center justify-center mx-auto mb-4">
                  <FlaskConical className="w-8 h-8 text-primary" />
                </div>
                <h2 className="text-lg font-semibold mb-2">Sieve Analysis Tool</h2>
                <p className="text-sm text-muted-foreground mb-4">
                  Enter the weight retained on each sieve, coarsest first, to compute the
                  gradation table, D10/D30/D60, Cu and Cc and a soil classification.
                </p>
                <div className="flex flex-wrap items-center justify-center gap-3 text-xs text-muted-foreground">
                  <span className="px-2 py-1 rounded bg-muted/40 border border-border">% Passing</span>
                  <span className="px-2 py-1 rounded bg-muted/40 border border-border">Semi-log curve</span>
                  <span className="px-2 py-1 rounded bg-muted/40 border border-border">PDF report</span>
                </div>
              </div>
            </div>
          )}
        </main>
      </div>

      {showExportDialog && (
        <ReportExportDialog
          open={showExportDialog}
          onOpenChange={setShowExportDialog}
          initialDetails={sampleDetails}
          onExport={(format, details) => {
            void handleExport(format, details);
          }}
        />
      )}
    </div>
  );
}
