import type { GradationAnalysis, SampleDetails } from '@/types/gradation';
import {
  TABLE_HEADERS,
  buildTableRows,
  buildInterpretationLines,
  buildRangeNotes,
  getInterpolationLabel,
  reportFileName,
  REPORT_TITLE,
} from '@/utils/gradationFormatting';

const CHART_UNAVAILABLE_NOTE =
  'Chart unavailable: the passing curve could not be captured for this report. See the table above.';

export interface GradationWordOptions {
  analysis: GradationAnalysis;
  sample?: SampleDetails;
  chartImage?: string;
  generatedAt?: Date;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Same content as the PDF report as a standalone HTML document, which Word
 * opens when saved with a .doc extension.
 */
export function buildGradationWordHtml({ analysis, sample = {}, chartImage, generatedAt = new Date() }: GradationWordOptions): string {
  const { classification } = analysis;
  const isWellGraded = classification.gradation === 'well-graded';

  const details = [
    sample.projectName ? `<p><strong>Project:</strong> ${escapeHtml(sample.projectName)}</p>` : '',
    sample.sampleId ? `<p><strong>Sample:</strong> ${escapeHtml(sample.sampleId)}</p>` : '',
    sample.location ? `<p><strong>Location:</strong> ${escapeHtml(sample.location)}</p>` : '',
    sample.testedBy ? `<p><strong>Tested by:</strong> ${escapeHtml(sample.testedBy)}</p>` : '',
    `<p><strong>Sieve set:</strong> ${escapeHtml(analysis.sieveSpec.name)}</p>`,
    `<p><strong>Total dry mass:</strong> ${analysis.totalWeight.toFixed(2)} g</p>`,
    `<p><strong>Generated:</strong> ${generatedAt.toLocaleDateString('en-GB')}</p>`,
  ].filter(Boolean).join('\n');

  const tableRows = buildTableRows(analysis).map(row => `
            <tr>
              <td>${row.sieveSize}</td>
              <td>${row.weightRetained}</td>
              <td>${row.percentRetained}</td>
              <td>${row.cumulativePercentRetained}</td>
              <td>${row.percentPassing}</td>
            </tr>`).join('');

  const interpretation = buildInterpretationLines(analysis).map(line => `
            <tr>
              <td>${escapeHtml(line.label)}</td>
              <td>${escapeHtml(line.unit ? `${line.value} ${line.unit}` : line.value)}</td>
            </tr>`).join('');

  const notes = buildRangeNotes(analysis)
    .map(note => `<p class="note">${escapeHtml(note)}</p>`)
    .join('\n');

  const chart = chartImage
    ? `<h2>Particle Size Distribution Curve</h2>\n        <img src="${chartImage}" width="600" alt="Particle size distribution curve" />`
    : `<h2>Particle Size Distribution Curve</h2>\n        <p class="note">${CHART_UNAVAILABLE_NOTE}</p>`;

  return `<!DOCTYPE html>
      <html>
      <head>
        <meta charset="utf-8">
        <title>${REPORT_TITLE}</title>
        <style>
          body { font-family: Arial, sans-serif; font-size: 11pt; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; }
          h1 { color: #006699; border-bottom: 2px solid #006699; padding-bottom: 10px; }
          h2 { color: #2b3948; margin-top: 30px; }
          table { border-collapse: collapse; width: 100%; margin: 15px 0; }
          th { background-color: #006699; color: white; padding: 8px; text-align: center; }
          td { border: 1px solid #ddd; padding: 8px; text-align: center; }
          tr:nth-child(even) { background-color: #f5f7fa; }
          .well { color: #228b22; font-weight: bold; }
          .poor { color: #c88c00; font-weight: bold; }
          .note { color: #c88c00; font-size: 9pt; }
          .summary-box { background-color: #f5f7fa; padding: 15px; border-radius: 5px; margin: 20px 0; }
          .footer { font-size: 9pt; color: #777; margin-top: 40px; border-top: 1px solid #ddd; padding-top: 10px; }
        </style>
      </head>
      <body>
        <h1>${REPORT_TITLE}</h1>

        <div class="summary-box">
          ${details}
          <p><strong>Classification:</strong> ${escapeHtml(classification.soilLabel)}, <span class="${isWellGraded ? 'well' : 'poor'}">${escapeHtml(classification.gradationLabel)}</span></p>
        </div>

        <h2>Sieve Analysis Table</h2>
        <table>
          <tr>
            ${TABLE_HEADERS.map(h => `<th>${escapeHtml(h)}</th>`).join('')}
          </tr>${tableRows}
        </table>

        ${chart}

        <h2>Interpretation</h2>
        <table>${interpretation}
        </table>
        ${notes}

        <div class="footer">
          <p>${escapeHtml(getInterpolationLabel(analysis))}; pan excluded from the interpolation domain.</p>
          <p>Cu = D60 / D10, Cc = D30&sup2; / (D10 &times; D60). Well-graded when Cu &gt; 4 and 1 &lt; Cc &lt; 3.</p>
        </div>
      </body>
      </html>`;
}

export function exportGradationWord(options: GradationWordOptions): string {
  const htmlContent = buildGradationWordHtml(options);
  const filename = reportFileName(options.sample?.sampleId, 'doc');

  const blob = new Blob([htmlContent], { type: 'application/msword' });
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = filename;
  link.click();
  URL.revokeObjectURL(url);

  return filename;
}
