import {
  ANOMALY_VIEW_COLUMNS,
  formatPercentage,
  selectAnomalyRecords
} from "../../lib/analysis/summary";
import type { AnalysisRun } from "../../lib/analysis/runAnalysis";
import { EXPORT_FILE_NAME } from "../../lib/config";
import { formatCellText } from "../../lib/records/numeric";

type AnalysisResultsPanelProps = {
  run: AnalysisRun;
  onDownload: () => void;
  onClear: () => void;
  downloading?: boolean;
};

export const AnalysisResultsPanel = ({
  run,
  onDownload,
  onClear,
  downloading = false
}: AnalysisResultsPanelProps) => {
  const { summary } = run;
  const anomalies = selectAnomalyRecords(run.records);

  return (
    <section className="analysis-results">
      <h2>Analysis Results</h2>

      <div className="metric-row">
        <div className="metric">
          <span className="metric-label">Total Analyzed</span>
          <span className="metric-value" data-testid="metric-total">
            {summary.total}
          </span>
        </div>
        <div className="metric">
          <span className="metric-label">Normal</span>
          <span className="metric-value" data-testid="metric-normal">
            {summary.normal}
          </span>
        </div>
        <div className="metric">
          <span className="metric-label">Abnormal</span>
          <span className="metric-value" data-testid="metric-abnormal">
            {summary.abnormal}
          </span>
        </div>
        <div className="metric">
          <span className="metric-label">Not Analyzed</span>
          <span className="metric-value" data-testid="metric-not-analyzed">
            {summary.notAnalyzed}
          </span>
        </div>
        <div className="metric">
          <span className="metric-label">Abnormal Rate</span>
          <span className="metric-value" data-testid="metric-rate">
            {formatPercentage(summary.abnormalPercentage)}
          </span>
        </div>
      </div>

      {run.diagnostics.length > 0 && (
        <ul className="analysis-diagnostics">
          {run.diagnostics.map((diagnostic) => (
            <li key={diagnostic.code} className={`finding ${diagnostic.severity}`}>
              <p>{diagnostic.title}</p>
              <p className="meta">{diagnostic.description}</p>
            </li>
          ))}
        </ul>
      )}

      {anomalies.length === 0 ? (
        <p className="success">
          No anomalies detected! All measurements are within acceptable ranges.
        </p>
      ) : (
        <>
          <h3>Detailed Anomaly Records</h3>
          <table className="anomaly-table">
            <thead>
              <tr>
                {ANOMALY_VIEW_COLUMNS.map((column) => (
                  <th key={column}>{column}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {anomalies.map((row) => (
                <tr key={`row-${row.rowIndex}`}>
                  {ANOMALY_VIEW_COLUMNS.map((column) => (
                    <td key={`${row.rowIndex}-${column}`}>{formatCellText(row.values[column])}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>

          <div className="breakdowns">
            <div>
              <h4>By test type</h4>
              <ul data-testid="breakdown-result-name">
                {summary.byResultName.map((entry) => (
                  <li key={entry.resultName}>
                    {entry.resultName}: {entry.abnormalCount}
                  </li>
                ))}
              </ul>
            </div>
            <div>
              <h4>Affected test sessions</h4>
              <ul data-testid="breakdown-session">
                {summary.bySession.map((entry) => (
                  <li key={String(entry.testNumber)}>
                    {entry.testNumber}: {entry.abnormalCount} ({entry.resultNames.join(", ")})
                  </li>
                ))}
              </ul>
            </div>
          </div>
        </>
      )}

      <h3>Export Results</h3>
      <p className="meta" data-testid="export-file-name">
        {EXPORT_FILE_NAME}
      </p>
      <div className="analysis-actions">
        <button type="button" className="primary" onClick={onDownload} disabled={downloading}>
          Download Results (Excel with highlighting)
        </button>
        <button type="button" className="ghost" onClick={onClear}>
          Clear Results
        </button>
      </div>
    </section>
  );
};
