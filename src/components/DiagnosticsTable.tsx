import React from "react";
import type { DiagnosticsReport } from "../lib/types";
import { DIAGNOSTICS_COLUMNS, diagnosticsRows } from "../lib/diagnostics";

export function DiagnosticsTable({ report, digits }: { report: DiagnosticsReport; digits?: number }): React.ReactElement {
  const rows = diagnosticsRows(report, digits);
  return (
    <table style={{ fontFamily: "monospace", fontSize: 12, borderCollapse: "collapse" }}>
      <caption style={{ textAlign: "left" }}>
        scaling {report.scaling}, {report.knotCount} knots, {report.segmentCount} segments
      </caption>
      <thead>
        <tr>
          {DIAGNOSTICS_COLUMNS.map(col => <th key={col} style={{ textAlign: "left", paddingRight: 8 }}>{col}</th>)}
        </tr>
      </thead>
      <tbody>
        {rows.map(r => (
          <tr key={r.knot}>
            {DIAGNOSTICS_COLUMNS.map(col => <td key={col} style={{ paddingRight: 8 }}>{r[col]}</td>)}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export default DiagnosticsTable;
