import type { LoadReport } from "../../lib/records/validation";

type LoadReportPanelProps = {
  fileName: string;
  report: LoadReport;
};

const statusLabels: Record<LoadReport["status"], string> = {
  clean: "Clean",
  "needs-info": "Needs review",
  broken: "Broken"
};

const statusTone: Record<LoadReport["status"], string> = {
  clean: "status-clean",
  "needs-info": "status-warning",
  broken: "status-error"
};

const numberFormat = new Intl.NumberFormat("en-US");

export const LoadReportPanel = ({ fileName, report }: LoadReportPanelProps) => (
  <div className="load-report">
    <header className="load-report-header">
      <div>
        <h3>File loaded: {fileName}</h3>
        <p className="meta">
          Total rows: {numberFormat.format(report.stats.totalRows)} · Products:{" "}
          {report.stats.totalItems} · Tests: {report.stats.totalTests}
        </p>
      </div>
      <span className={`status-pill ${statusTone[report.status]}`}>
        {statusLabels[report.status]}
      </span>
    </header>

    {report.findings.length > 0 && (
      <ul className="load-findings">
        {report.findings.map((finding) => (
          <li key={finding.code} className={`finding ${finding.severity}`}>
            <span className="tag">{finding.severity.toUpperCase()}</span>
            <div>
              <p>{finding.title}</p>
              <p className="meta">
                {finding.description}
                {finding.details?.rowCount !== undefined && ` (${finding.details.rowCount} rows)`}
              </p>
              {finding.hint && <p className="hint">{finding.hint}</p>}
            </div>
          </li>
        ))}
      </ul>
    )}
  </div>
);
