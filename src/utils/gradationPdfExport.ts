import { jsPDF } from 'jspdf';
import type { GradationAnalysis, SampleDetails } from '@/types/gradation';
import {
  TABLE_HEADERS,
  buildTableRows,
  buildInterpretationLines,
  buildRangeNotes,
  buildChartPoints,
  getChartTicks,
  getInterpolationLabel,
  formatInterpretationLine,
  formatSieveSize,
  reportFileName,
  REPORT_TITLE,
} from '@/utils/gradationFormatting';

export interface GradationPdfOptions {
  analysis: GradationAnalysis;
  sample?: SampleDetails;
  /** PNG data URL of the on-screen chart; the curve is drawn as vectors when absent */
  chartImage?: string;
  generatedAt?: Date;
}

type RGB = [number, number, number];

const colors = {
  primary: [0, 102, 153],
  success: [34, 139, 34],
  warning: [200, 140, 0],
  header: [43, 57, 72],
  text: [51, 51, 51],
  muted: [119, 119, 119],
  border: [200, 200, 200],
  lightBg: [245, 247, 250],
  white: [255, 255, 255],
  curve: [34, 139, 34],
} satisfies Record<string, RGB>;

// The standard 14 fonts only cover WinAnsi
function toPdfText(text: string): string {
  return text
    .replace(/∞/g, 'infinite')
    .replace(/µ/g, 'u')
    .replace(/[–—]/g, '-');
}

interface PlotArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Passing curve on a log10 size axis (pan excluded), 0–100 % passing on a
 * linear axis, sieve openings as ticks and dashed markers at D10/D30/D60.
 */
export function drawPassingCurve(pdf: jsPDF, analysis: GradationAnalysis, area: PlotArea) {
  const ticks = getChartTicks(analysis.sieveSpec);
  const points = buildChartPoints(analysis);

  let logMin = Math.log10(ticks[0]);
  let logMax = Math.log10(ticks[ticks.length - 1]);
  if (logMax - logMin < 1e-9) {
    logMin -= 0.5;
    logMax += 0.5;
  }

  const toX = (size: number) => area.x + ((Math.log10(size) - logMin) / (logMax - logMin)) * area.width;
  const toY = (passing: number) => area.y + area.height - (passing / 100) * area.height;

  // Frame
  pdf.setDrawColor(...colors.border);
  pdf.setLineWidth(0.3);
  pdf.rect(area.x, area.y, area.width, area.height);

  // Grid
  pdf.setLineWidth(0.1);
  pdf.setLineDashPattern([1, 1], 0);
  pdf.setFontSize(6);
  pdf.setTextColor(...colors.muted);
  for (let p = 0; p <= 100; p += 10) {
    const gy = toY(p);
    if (p > 0 && p < 100) {
      pdf.line(area.x, gy, area.x + area.width, gy);
    }
    pdf.text(`${p}`, area.x - 2, gy + 1, { align: 'right' });
  }
  ticks.forEach((size) => {
    const gx = toX(size);
    pdf.line(gx, area.y, gx, area.y + area.height);
    pdf.text(formatSieveSize(size), gx, area.y + area.height + 4, { align: 'center' });
  });
  pdf.setLineDashPattern([], 0);

  // Axis titles
  pdf.setFontSize(7);
  pdf.setTextColor(...colors.header);
  pdf.text('Sieve Size (mm) [Log Scale]', area.x + area.width / 2, area.y + area.height + 10, { align: 'center' });
  pdf.text('Cumulative % Passing', area.x - 9, area.y + area.height / 2, { align: 'center', angle: 90 });

  // D10 / D30 / D60 markers
  const { d10, d30, d60 } = analysis.diameters;
  pdf.setDrawColor(...colors.warning);
  pdf.setLineWidth(0.2);
  pdf.setLineDashPattern([2, 1.5], 0);
  pdf.setFontSize(6);
  pdf.setTextColor(...colors.warning);
  [d10, d30, d60].forEach((d) => {
    if (d.range !== 'within') return;
    const dx = toX(d.value);
    const dy = toY(d.percent);
    pdf.line(dx, dy, dx, area.y + area.height);
    pdf.line(area.x, dy, dx, dy);
    pdf.text(`D${d.percent}`, dx + 1, dy - 1);
  });
  pdf.setLineDashPattern([], 0);

  // Curve
  pdf.setDrawColor(...colors.curve);
  pdf.setFillColor(...colors.curve);
  pdf.setLineWidth(0.5);
  for (let i = 1; i < points.length; i++) {
    pdf.line(toX(points[i - 1].size), toY(points[i - 1].passing), toX(points[i].size), toY(points[i].passing));
  }
  points.forEach((pt) => {
    pdf.circle(toX(pt.size), toY(pt.passing), 0.8, 'F');
  });
}

/**
 * Assemble the sieve analysis report: title, sample details, data table,
 * passing curve and interpretation. Values are taken as computed; nothing is
 * recalculated here.
 */
export function buildGradationPdf({ analysis, sample = {}, chartImage, generatedAt = new Date() }: GradationPdfOptions): jsPDF {
  const pdf = new jsPDF('p', 'mm', 'a4');
  const pageWidth = pdf.internal.pageSize.getWidth();
  const pageHeight = pdf.internal.pageSize.getHeight();
  const margin = 15;
  const contentWidth = pageWidth - margin * 2;

  const ensureSpace = (y: number, needed: number): number => {
    if (y + needed > pageHeight - 20) {
      pdf.addPage();
      return 20;
    }
    return y;
  };

  // ── Title ──
  pdf.setFillColor(...colors.primary);
  pdf.rect(0, 0, pageWidth, 35, 'F');

  pdf.setTextColor(255, 255, 255);
  pdf.setFontSize(22);
  pdf.setFont('helvetica', 'bold');
  pdf.text(REPORT_TITLE, margin, 20);

  pdf.setFontSize(10);
  pdf.setFont('helvetica', 'normal');
  pdf.text(toPdfText(`Particle size distribution - ${analysis.sieveSpec.name}`), margin, 28);

  let y = 45;

  // ── Sample details ──
  pdf.setTextColor(...colors.header);
  pdf.setFontSize(11);
  pdf.setFont('helvetica', 'bold');
  if (sample.projectName) {
    pdf.text(toPdfText(`Project: ${sample.projectName}`), margin, y);
    y += 7;
  }
  if (sample.sampleId) {
    pdf.text(toPdfText(`Sample: ${sample.sampleId}`), margin, y);
    y += 7;
  }

  pdf.setTextColor(...colors.muted);
  pdf.setFontSize(9);
  pdf.setFont('helvetica', 'normal');
  if (sample.location) {
    pdf.text(toPdfText(`Location: ${sample.location}`), margin, y);
    y += 5;
  }
  if (sample.testedBy) {
    pdf.text(toPdfText(`Tested by: ${sample.testedBy}`), margin, y);
    y += 5;
  }
  pdf.text(`Total dry mass: ${analysis.totalWeight.toFixed(2)} g`, margin, y);
  y += 5;
  pdf.text(
    `Generated: ${generatedAt.toLocaleDateString('en-GB', { day: 'numeric', month: 'long', year: 'numeric' })}`,
    margin,
    y
  );
  y += 10;

  // ── Classification box ──
  const { classification } = analysis;
  const isWellGraded = classification.gradation === 'well-graded';
  pdf.setFillColor(...colors.lightBg);
  pdf.roundedRect(margin, y, contentWidth, 24, 3, 3, 'F');
  pdf.setDrawColor(...colors.border);
  pdf.roundedRect(margin, y, contentWidth, 24, 3, 3, 'S');

  pdf.setTextColor(...colors.header);
  pdf.setFontSize(10);
  pdf.setFont('helvetica', 'bold');
  pdf.text('Classification', margin + 5, y + 8);

  pdf.setTextColor(...colors.primary);
  pdf.setFontSize(16);
  pdf.text(toPdfText(classification.soilLabel), margin + 5, y + 18);

  const badgeX = margin + contentWidth - 55;
  pdf.setFillColor(...(isWellGraded ? colors.success : colors.warning));
  pdf.roundedRect(badgeX, y + 5, 50, 14, 2, 2, 'F');
  pdf.setTextColor(255, 255, 255);
  pdf.setFontSize(8);
  pdf.setFont('helvetica', 'bold');
  pdf.text(classification.gradationLabel.toUpperCase(), badgeX + 25, y + 13.5, { align: 'center' });

  y += 34;

  // ── Data table ──
  const rows = buildTableRows(analysis);
  y = ensureSpace(y, 16 + rows.length * 7);

  pdf.setTextColor(...colors.header);
  pdf.setFontSize(10);
  pdf.setFont('helvetica', 'bold');
  pdf.text('Sieve Analysis Table', margin, y);
  y += 6;

  const colWidth = contentWidth / TABLE_HEADERS.length;
  pdf.setFillColor(...colors.primary);
  pdf.rect(margin, y, contentWidth, 7, 'F');
  pdf.setTextColor(255, 255, 255);
  pdf.setFontSize(7);
  TABLE_HEADERS.forEach((label, i) => {
    pdf.text(label, margin + colWidth * i + colWidth / 2, y + 5, { align: 'center' });
  });
  y += 7;

  pdf.setFont('helvetica', 'normal');
  rows.forEach((row, i) => {
    pdf.setFillColor(...(i % 2 === 0 ? colors.white : colors.lightBg));
    pdf.rect(margin, y, contentWidth, 6, 'F');
    pdf.setTextColor(...colors.text);
    [
      row.sieveSize,
      row.weightRetained,
      row.percentRetained,
      row.cumulativePercentRetained,
      row.percentPassing,
    ].forEach((cell, c) => {
      pdf.text(cell, margin + colWidth * c + colWidth / 2, y + 4.5, { align: 'center' });
    });
    y += 6;
  });

  pdf.setDrawColor(...colors.border);
  pdf.setLineWidth(0.3);
  pdf.rect(margin, y - rows.length * 6 - 7, contentWidth, rows.length * 6 + 7);
  y += 10;

  // ── Passing curve ──
  const chartHeight = contentWidth * 0.6;
  y = ensureSpace(y, chartHeight + 24);

  pdf.setTextColor(...colors.header);
  pdf.setFontSize(10);
  pdf.setFont('helvetica', 'bold');
  pdf.text('Particle Size Distribution Curve', margin, y);
  y += 6;

  let chartDrawn = false;
  if (chartImage) {
    try {
      pdf.addImage(chartImage, 'PNG', margin, y, contentWidth, chartHeight);
      chartDrawn = true;
    } catch (e) {
      console.error('[Report] Failed to embed chart image, drawing vector curve instead', e);
    }
  }
  if (!chartDrawn) {
    drawPassingCurve(pdf, analysis, {
      x: margin + 14,
      y: y + 2,
      width: contentWidth - 18,
      height: chartHeight - 16,
    });
  }
  y += chartHeight + 8;

  // ── Interpretation ──
  const interpretation = buildInterpretationLines(analysis).map(formatInterpretationLine);
  const notes = buildRangeNotes(analysis);
  y = ensureSpace(y, 20 + (interpretation.length + notes.length) * 5);

  pdf.setTextColor(...colors.header);
  pdf.setFontSize(10);
  pdf.setFont('helvetica', 'bold');
  pdf.text('Interpretation', margin, y);
  y += 6;

  pdf.setFontSize(9);
  pdf.setFont('helvetica', 'normal');
  pdf.setTextColor(...colors.text);
  interpretation.forEach((line) => {
    pdf.text(toPdfText(line), margin + 5, y);
    y += 5;
  });

  if (notes.length > 0) {
    y += 2;
    pdf.setFontSize(8);
    pdf.setTextColor(...colors.warning);
    notes.forEach((note) => {
      const wrapped: string[] = pdf.splitTextToSize(toPdfText(note), contentWidth - 10);
      wrapped.forEach((w) => {
        pdf.text(w, margin + 5, y);
        y += 4;
      });
    });
  }

  // ── Method note ──
  y = ensureSpace(y + 6, 28);
  pdf.setFillColor(...colors.lightBg);
  pdf.roundedRect(margin, y, contentWidth, 24, 3, 3, 'F');
  pdf.setTextColor(...colors.header);
  pdf.setFontSize(9);
  pdf.setFont('helvetica', 'bold');
  pdf.text('Method', margin + 5, y + 7);

  pdf.setTextColor(...colors.text);
  pdf.setFontSize(7);
  pdf.setFont('helvetica', 'normal');
  const methodLines = [
    `- ${getInterpolationLabel(analysis)}; pan excluded from the interpolation domain.`,
    '- Cu = D60 / D10, Cc = D30^2 / (D10 x D60). Well-graded when Cu > 4 and 1 < Cc < 3.',
    '- D10 < 0.075 mm: fine soil; 0.075 - 2 mm: sand; 2 mm and above: gravel/coarse soil.',
  ];
  methodLines.forEach((line, i) => {
    pdf.text(line, margin + 5, y + 12 + i * 4);
  });

  // ── Page footer ──
  const totalPages = pdf.getNumberOfPages();
  for (let i = 1; i <= totalPages; i++) {
    pdf.setPage(i);
    pdf.setFontSize(7);
    pdf.setTextColor(...colors.muted);
    pdf.text(`${REPORT_TITLE} - Page ${i} of ${totalPages}`, pageWidth / 2, pageHeight - 8, { align: 'center' });
  }

  return pdf;
}

export function exportGradationPDF(options: GradationPdfOptions): string {
  const pdf = buildGradationPdf(options);
  const filename = reportFileName(options.sample?.sampleId, 'pdf');
  pdf.save(filename);
  return filename;
}
